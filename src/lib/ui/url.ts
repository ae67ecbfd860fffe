/** Swap the query string in place without adding a history entry. */
export function replaceQuery(params: URLSearchParams): void {
  if (typeof window === 'undefined' || typeof window.history?.replaceState !== 'function') return;
  const u = new URL(window.location.href);
  u.search = params.toString();
  window.history.replaceState(window.history.state, '', u.toString());
}
