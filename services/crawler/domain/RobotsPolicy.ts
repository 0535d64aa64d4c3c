import * as robotsParserModule from 'robots-parser';
import type { RobotsFetcher } from '../../../shared/domain/capabilities/Renderer.js';
import { Logger, getLogger } from '../../../shared/infrastructure/logging.js';

type Robot = ReturnType<typeof robotsParserModule.default>;

// robots-parser is CommonJS; its function is the namespace default
const robotsParser = robotsParserModule.default;

/**
 * Robots directives for one crawl job.
 *
 * robots.txt is fetched once per origin and cached for the job's lifetime.
 * A missing file or a failed fetch allows everything.
 */
export class RobotsPolicy {
  private cache = new Map<string, Promise<Robot | null>>();
  private fetcher: RobotsFetcher;
  private userAgent: string;
  private logger: Logger;

  constructor(fetcher: RobotsFetcher, userAgent: string, loggerInstance?: Logger) {
    this.fetcher = fetcher;
    this.userAgent = userAgent;
    this.logger = loggerInstance || getLogger();
  }

  /**
   * Whether url may be fetched. With overrideEnabled disallow rules are ignored;
   * crawl delay still comes from crawlDelayMs().
   */
  async allowed(url: string, overrideEnabled: boolean): Promise<boolean> {
    if (overrideEnabled) {
      return true;
    }
    const robot = await this.load(url);
    // isAllowed is undefined for URLs outside the robots file's origin
    return robot === null || robot.isAllowed(url, this.userAgent) !== false;
  }

  /**
   * Crawl-delay directive for the user agent in milliseconds, 0 when absent.
   */
  async crawlDelayMs(url: string): Promise<number> {
    const robot = await this.load(url);
    const seconds = robot?.getCrawlDelay(this.userAgent);
    return typeof seconds === 'number' && seconds > 0 ? seconds * 1000 : 0;
  }

  private load(url: string): Promise<Robot | null> {
    const origin = new URL(url).origin;
    let robot = this.cache.get(origin);
    if (!robot) {
      robot = this.fetchAndParse(origin);
      this.cache.set(origin, robot);
    }
    return robot;
  }

  private async fetchAndParse(origin: string): Promise<Robot | null> {
    const robotsUrl = `${origin}/robots.txt`;
    try {
      const body = await this.fetcher.fetchRobots(origin, this.userAgent);
      if (body === null) {
        this.logger.debug(`No robots.txt for ${origin}; allowing all`, 'RobotsPolicy');
        return null;
      }
      return robotsParser(robotsUrl, body);
    } catch (error: unknown) {
      this.logger.warn(`Could not load ${robotsUrl}; allowing all`, 'RobotsPolicy', error);
      return null;
    }
  }
}
