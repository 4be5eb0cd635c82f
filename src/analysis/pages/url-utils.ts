// src/analysis/pages/url-utils.ts
// URL comparison for page boundaries. Targets come straight from goto()/waitForURL()
// arguments: absolute URLs, relative paths, globs ("**/dashboard") or regex text.

import { pascalCase, words } from "../../utils/naming";

export type UrlThreshold = "full" | "path" | "domain";

export interface UrlTarget {
  raw: string;
  isRegex: boolean;
}

interface UrlParts {
  host: string | null;
  path: string;
  query: string;
}

const SCHEME_RE = /^[a-z][\w+.-]*:\/\//i;
const PARAM_SEGMENT_RE = /^(\d+|:\w+|\*+|\[.*\]|[0-9a-f]{8}-[0-9a-f-]{27,}|\{.*\})$/i;

/** Concrete = no wildcard apart from a leading `**`. */
export function isConcrete(target: UrlTarget): boolean {
  if (target.isRegex) return false;
  return !/[*]/.test(target.raw.replace(/^\*\*/, ""));
}

function normalizePath(path: string): string {
  const stripped = path.replace(/\/+$/, "");
  if (stripped === "") return "/";
  return stripped.startsWith("/") || stripped.startsWith("*") ? stripped : `/${stripped}`;
}

export function splitUrl(raw: string): UrlParts {
  if (SCHEME_RE.test(raw)) {
    try {
      const url = new URL(raw);
      return { host: url.host, path: normalizePath(url.pathname), query: url.search };
    } catch {
      // fall through to manual split
    }
  }
  const withoutHash = raw.split("#")[0];
  const queryIndex = withoutHash.indexOf("?");
  const path = queryIndex === -1 ? withoutHash : withoutHash.slice(0, queryIndex);
  const query = queryIndex === -1 ? "" : withoutHash.slice(queryIndex);
  return { host: null, path: normalizePath(path), query };
}

function patternHost(raw: string): string | null {
  const m = /^[a-z][\w+.-]*:\/\/([^/]+)/i.exec(raw);
  return m && !m[1].includes("*") ? m[1] : null;
}

function toRegExp(target: UrlTarget): RegExp | null {
  try {
    if (target.isRegex) {
      const m = /^\/([\s\S]*)\/([a-z]*)$/.exec(target.raw);
      return m ? new RegExp(m[1], m[2]) : null;
    }
    const source = target.raw
      .replace(/[.+^${}()|[\]\\]/g, "\\$&")
      .replace(/\*\*/g, "\u0000")
      .replace(/\*/g, "[^/]*")
      .replace(/\?/g, "\\?")
      .replace(/\u0000/g, ".*");
    return new RegExp(`^${source}/?$`);
  } catch {
    return null;
  }
}

/** Does a glob or regex target match a concrete URL? */
function patternMatches(pattern: UrlTarget, concrete: string, threshold: UrlThreshold): boolean {
  const re = toRegExp(pattern);
  if (!re) return false;
  if (pattern.isRegex) return re.test(concrete);
  const parts = splitUrl(concrete);
  const subject = threshold === "full" ? concrete : parts.path;
  return re.test(subject) || re.test(concrete);
}

/**
 * True when `target` points at the page already shown (`current`) under the
 * configured threshold. An unknown current location never matches.
 */
export function isSameLocation(current: UrlTarget | null, target: UrlTarget, threshold: UrlThreshold): boolean {
  if (!current) return false;
  if (current.raw === target.raw && current.isRegex === target.isRegex) return true;

  if (threshold === "domain") {
    const currentHost = isConcrete(current) ? splitUrl(current.raw).host : patternHost(current.raw);
    const targetHost = isConcrete(target) ? splitUrl(target.raw).host : patternHost(target.raw);
    // a relative target stays on the current host
    if (targetHost === null) return true;
    return currentHost !== null && currentHost === targetHost;
  }

  const targetConcrete = isConcrete(target);
  const currentConcrete = isConcrete(current);
  if (!targetConcrete && currentConcrete) return patternMatches(target, current.raw, threshold);
  if (targetConcrete && !currentConcrete) return patternMatches(current, target.raw, threshold);
  if (!targetConcrete && !currentConcrete) return false;

  const a = splitUrl(current.raw.replace(/^\*\*/, ""));
  const b = splitUrl(target.raw.replace(/^\*\*/, ""));
  if (a.host !== null && b.host !== null && a.host !== b.host) return false;
  if (threshold === "full") return a.path === b.path && a.query === b.query;
  return a.path === b.path;
}

/** Generalized path used as a page's url_pattern: ids become `:id`, a leading `**` is dropped. */
export function urlPattern(target: UrlTarget): string {
  if (target.isRegex) return target.raw;
  const raw = target.raw.replace(/^\*\*(?=\/)/, "");
  if (!isConcrete({ raw, isRegex: false })) return raw;
  const { path } = splitUrl(raw);
  return path
    .split("/")
    .map((segment) => (/^\d+$/.test(segment) || /^[0-9a-f]{8}-[0-9a-f-]{27,}$/i.test(segment) ? ":id" : segment))
    .join("/");
}

/** "/account/settings" → "SettingsPage"; "/" → "HomePage". */
export function pageNameFromUrl(target: UrlTarget): string {
  let segments: string[];
  if (target.isRegex) {
    const body = target.raw.replace(/^\/|\/[a-z]*$/g, "");
    segments = body
      .replace(/\\[dwsDWS][+*]?|[.*+?^$()[\]{}|\\]/g, " ")
      .split(/[\s/]+/)
      .filter((s) => /[A-Za-z]{2,}/.test(s));
  } else {
    segments = splitUrl(target.raw.replace(/^\*\*(?=\/)/, "")).path.split("/").filter(Boolean);
  }
  const meaningful = segments.filter((s) => !PARAM_SEGMENT_RE.test(s) && words(s).length > 0);
  const last = meaningful[meaningful.length - 1];
  if (!last) return "HomePage";
  const base = pascalCase(last.replace(/\.\w+$/, ""));
  return base.endsWith("Page") ? base : `${base}Page`;
}
