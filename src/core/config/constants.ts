// src/core/config/constants.ts
export const DEFAULT_TIMEOUT = 30000; // 30 seconds
export const DEFAULT_SCROLL_TIMEOUT = 10000;
export const DEFAULT_SETTLE_DELAY = 1000;
export const DEFAULT_MAX_HEADING_LEVEL = 3;

export const BROWSER_CHANNELS = ['chromium', 'chrome', 'msedge'] as const;
export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';
export const DEFAULT_VIEWPORT = { width: 1920, height: 1080 };

export const SCROLL_TO_BOTTOM_SCRIPT = 'window.scrollTo(0, document.body ? document.body.scrollHeight : 0)';
export const DOCUMENT_HEIGHT_SCRIPT =
  'Math.max(document.body ? document.body.scrollHeight : 0, document.documentElement ? document.documentElement.scrollHeight : 0)';
