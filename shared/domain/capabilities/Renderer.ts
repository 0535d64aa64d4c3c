/**
 * What a renderer reports for one URL. Non-2xx statuses are results, not errors.
 */
export interface RenderResult {
  /** URL after redirects */
  url: string;
  status: number;
  html: string;
  /** Absolute outbound links in document order */
  links: string[];
  contentType: string | null;
  lastModified: string | null;
}

export interface Renderer {
  /**
   * @throws FetchError for page level failures, RendererUnavailableError when the target cannot be reached at all
   */
  render(url: string, userAgent: string): Promise<RenderResult>;
}

export interface RobotsFetcher {
  /**
   * Fetch the robots.txt body for an origin, or null when there is none.
   */
  fetchRobots(origin: string, userAgent: string): Promise<string | null>;
}
