const ABSOLUTE_URL_PATTERN = /^(?:https?:)?\/\//i;

export function resolveTargetUrl(url: string): string {
  if (ABSOLUTE_URL_PATTERN.test(url)) {
    return url;
  }

  if (typeof document !== "undefined" && typeof document.baseURI === "string") {
    try {
      return new URL(url, document.baseURI).toString();
    } catch {
      // fall through to window.location
    }
  }

  if (typeof window !== "undefined" && typeof window.location?.href === "string") {
    try {
      return new URL(url, window.location.href).toString();
    } catch {
      // leave relative
    }
  }

  return url;
}

function slug(value: string): string {
  return value.toLowerCase().replace(/[^a-z0-9]+/g, "-").replace(/^-|-$/g, "");
}

/** Which stage failed; each stage keeps its own card per data source. */
export type ReportKind = "load" | "columns";

const REPORT_TITLES: Record<ReportKind, (where: string) => string> = {
  load: (where) => `${where} data failed to load`,
  columns: (where) => `${where} data check failed`,
};

/** Thrown by {@link requireOk} once the failure is already on the page. */
export class RequestError extends Error {
  readonly url: string;

  constructor(message: string, url: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RequestError";
    this.url = url;
  }
}

/**
 * Show (or replace) an alert card at the top of `#app`. One card per
 * `where` and `kind`, so a load failure and the column check that follows
 * it are both visible.
 */
export function reportError(where: string, message: string, kind: ReportKind = "columns"): void {
  if (typeof document === "undefined") {
    return;
  }

  const app = document.getElementById("app");
  if (!app) {
    return;
  }

  const key = `${slug(where)}-${kind}`;
  const existing = app.querySelector<HTMLDivElement>(`.error-card[data-report-key="${key}"]`);
  const card = existing ?? document.createElement("div");
  card.className = "error-card";
  card.dataset.reportKey = key;
  card.setAttribute("role", "alert");

  card.innerHTML = "";

  const heading = document.createElement("p");
  heading.className = "error-card__title";
  heading.textContent = REPORT_TITLES[kind](where);

  const body = document.createElement("p");
  body.className = "error-card__message";
  body.textContent = message;

  card.append(heading, body);

  if (!existing) {
    app.prepend(card);
  }
}

export async function requireOk(
  url: string,
  where: string,
  init?: RequestInit,
): Promise<Response> {
  const target = resolveTargetUrl(url);

  let response: Response;
  try {
    response = await fetch(target, init);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    reportError(where, `Request for ${target} failed: ${reason}.`, "load");
    throw new RequestError(`requireOk(${where}) request for ${target} failed: ${reason}`, target, { cause: error });
  }

  if (!response.ok) {
    const statusText = response.statusText?.trim();
    const detail = statusText ? `${response.status} ${statusText}` : `${response.status}`;
    reportError(where, `Request for ${target} returned ${detail}.`, "load");
    throw new RequestError(`requireOk(${where}) expected 200 for ${target} but received ${detail}`, target);
  }

  return response;
}
