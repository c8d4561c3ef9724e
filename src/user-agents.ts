export const USER_AGENTS = {
  probekit: 'probekit/0.1.0 (+node)',
  chrome_windows: 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0 Safari/537.36',
  chrome_mac: 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0 Safari/537.36',
  safari_ios: 'Mozilla/5.0 (iPhone; CPU iPhone OS 17_0 like Mac OS X) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.0 Mobile/15E148 Safari/604.1',
  firefox_windows: 'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:119.0) Gecko/20100101 Firefox/119.0',
  curl: 'curl/8.4.0',
} as const;

export type UserAgentName = keyof typeof USER_AGENTS;

function isUserAgentName(key: string): key is UserAgentName {
  return Object.hasOwn(USER_AGENTS, key);
}

/** Named profile, or the given string used verbatim. */
export function resolveUserAgent(name?: string): string {
  if (!name) return USER_AGENTS.probekit;
  const key = name.toLowerCase().replace(/[^a-z0-9]+/g, '_');
  return isUserAgentName(key) ? USER_AGENTS[key] : name;
}
