// Cookie/consent overlays that would otherwise end up in the preview
export const CONSENT_BANNER_SELECTORS = [
  ".cookie-consent-banner",
  "#cookie-notice",
  ".cookie-banner",
  ".consent-banner",
  "#onetrust-consent-sdk",
  "#CybotCookiebotDialog",
  "[id*='consent']",
  "[class*='consent']",
  "[aria-label*='consent']",
  "[aria-label*='cookie']",
];
