import type { SoftwareFamily } from "../types.js";
import { SOFTWARE_FAMILIES } from "../types.js";

export const ABSENT_FIELD = "-";

const SOFTWARE_FAMILY_LABELS: Record<SoftwareFamily, string> = {
  Chrome: "Chrome",
  Firefox: "Firefox",
  Safari: "Safari",
  FacebookBot: "Facebook Bot",
  BotOrCrawler: "Bot/Crawler",
  Other: "Other",
  Unknown: "Unknown",
};

// First match wins. Chrome user agents also mention Safari, so order matters.
export function classifySoftwareFamily(userAgent: string): SoftwareFamily {
  if (userAgent === ABSENT_FIELD) {
    return "Unknown";
  }

  const lowered = userAgent.toLowerCase();

  if (lowered.includes("chrome")) {
    return "Chrome";
  }
  if (lowered.includes("firefox")) {
    return "Firefox";
  }
  if (lowered.includes("safari")) {
    return "Safari";
  }
  if (lowered.includes("facebook")) {
    return "FacebookBot";
  }
  if (lowered.includes("bot") || lowered.includes("crawler")) {
    return "BotOrCrawler";
  }
  return "Other";
}

export function softwareFamilyLabel(family: SoftwareFamily): string {
  return SOFTWARE_FAMILY_LABELS[family];
}

export function isSoftwareFamily(value: string): value is SoftwareFamily {
  return SOFTWARE_FAMILIES.some((family) => family === value);
}
