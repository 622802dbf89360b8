const SHEBANG = /#!/g;
const UTM_SOURCE = /(?<=^|&)utm_source=[^&#]+&?/g;
const TRAILING_JUNK = /[&? ]+$/;

/**
 * Rewrites AJAX-crawl `#!` fragments into `_escaped_fragment_` queries, drops
 * `utm_source` tracking parameters from the query and trims trailing `&`,
 * `?` and spaces. Runs before decomposition: the rewrite moves text from
 * fragment to query.
 */
export function cleanupUrl(url: string): string {
  return stripQueryTracking(url.replace(SHEBANG, '?_escaped_fragment_=')).replace(TRAILING_JUNK, '');
}

// Only the text between the first `?` and the next `#` is a query.
function stripQueryTracking(url: string): string {
  const question = url.indexOf('?');
  if (question === -1) {
    return url;
  }

  const hash = url.indexOf('#', question);
  const end = hash === -1 ? url.length : hash;
  const query = url.slice(question + 1, end).replace(UTM_SOURCE, '');

  return `${url.slice(0, question + 1)}${query}${url.slice(end)}`;
}
