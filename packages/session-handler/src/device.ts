import { BadRequestApiError } from "@sessionguard/contracts";

interface PlatformRule {
  readonly name: string;
  readonly pattern: RegExp;
}

interface BrowserRule {
  readonly name: string;
  readonly pattern: RegExp;
}

// Order matters: iOS agents mention Mac OS X and Android agents mention Linux.
const PLATFORMS: ReadonlyArray<PlatformRule> = [
  { name: "Windows", pattern: /Windows NT/ },
  { name: "iOS", pattern: /iPhone|iPad|iPod/ },
  { name: "Android", pattern: /Android/ },
  { name: "ChromeOS", pattern: /CrOS/ },
  { name: "MacOS", pattern: /Macintosh|Mac OS X/ },
  { name: "Linux", pattern: /Linux|X11/ },
];

// Chromium derivatives also send a Chrome token, and everything sends Safari.
const BROWSERS: ReadonlyArray<BrowserRule> = [
  { name: "Edge", pattern: /Edg(?:e|A|iOS)?\/(\d+(?:\.\d+)*)/ },
  { name: "Opera", pattern: /(?:OPR|Opera)\/(\d+(?:\.\d+)*)/ },
  { name: "Firefox", pattern: /(?:Firefox|FxiOS)\/(\d+(?:\.\d+)*)/ },
  { name: "Chrome", pattern: /(?:Chrome|CriOS)\/(\d+(?:\.\d+)*)/ },
  { name: "Safari", pattern: /Version\/(\d+(?:\.\d+)*).*Safari\// },
];

export interface ParsedUserAgent {
  readonly platform: string;
  readonly browser: string;
  readonly version: string;
}

export const parseUserAgent = (userAgent: string): ParsedUserAgent | null => {
  const platform = PLATFORMS.find((rule) => rule.pattern.test(userAgent));
  if (!platform) {
    return null;
  }

  for (const rule of BROWSERS) {
    const match = rule.pattern.exec(userAgent);
    if (match?.[1]) {
      return { platform: platform.name, browser: rule.name, version: match[1] };
    }
  }

  return null;
};

/**
 * Device label stored with a session: `"<platform> (<browser> <version>)"` when
 * the agent is recognised, otherwise the trimmed raw User-Agent.
 */
export const resolveDevice = (userAgentValues: ReadonlyArray<string>): string => {
  if (userAgentValues.length === 0) {
    throw new BadRequestApiError("User agent required in request headers.");
  }

  const userAgent = userAgentValues[0].trim();
  if (userAgent.length === 0) {
    throw new BadRequestApiError("Empty user agent in request headers.");
  }

  const parsed = parseUserAgent(userAgent);
  return parsed ? `${parsed.platform} (${parsed.browser} ${parsed.version})` : userAgent;
};
