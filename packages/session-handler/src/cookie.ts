import type { CookieAttributes } from "./request.js";

/** Build a Set-Cookie header value. */
export const serializeSetCookie = (name: string, value: string, attributes: CookieAttributes): string => {
  const parts = [`${name}=${encodeURIComponent(value)}`, `Path=${attributes.path}`];

  if (attributes.maxAgeSeconds !== undefined) {
    parts.push(`Max-Age=${Math.max(0, Math.floor(attributes.maxAgeSeconds))}`);
  }
  if (attributes.expires) {
    parts.push(`Expires=${attributes.expires.toUTCString()}`);
  }
  if (attributes.httpOnly) {
    parts.push("HttpOnly");
  }
  if (attributes.secure) {
    parts.push("Secure");
  }
  parts.push(`SameSite=${attributes.sameSite}`);

  return parts.join("; ");
};

const decodeCookieValue = (value: string): string | undefined => {
  try {
    return decodeURIComponent(value);
  } catch {
    return undefined;
  }
};

/** Parse a Cookie header. The first occurrence of a name wins. */
export const parseCookieHeader = (header: string | undefined): Map<string, string> => {
  const cookies = new Map<string, string>();
  if (!header) {
    return cookies;
  }

  for (const part of header.split(";")) {
    const separator = part.indexOf("=");
    if (separator <= 0) {
      continue;
    }
    const name = part.slice(0, separator).trim();
    let raw = part.slice(separator + 1).trim();
    if (raw.length >= 2 && raw.startsWith('"') && raw.endsWith('"')) {
      raw = raw.slice(1, -1);
    }
    const value = decodeCookieValue(raw);
    if (name.length > 0 && value !== undefined && !cookies.has(name)) {
      cookies.set(name, value);
    }
  }

  return cookies;
};

/** Name of the cookie a Set-Cookie header value writes. */
export const setCookieName = (header: string): string => {
  const separator = header.indexOf("=");
  return (separator < 0 ? header : header.slice(0, separator)).trim();
};
