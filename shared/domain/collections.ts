/**
 * Name of the vector collection holding a domain's chunks: `<prefix>_<domain>`
 * with every character other than a letter or digit replaced by `_`.
 */
export function collectionName(prefix: string, domain: string): string {
  return `${prefix}_${domain.replace(/[^A-Za-z0-9]/g, '_')}`;
}
