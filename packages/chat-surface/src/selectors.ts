/**
 * Selector sets for a generic web chat page
 *
 * Each list is tried in order; the first visible match wins. Chat products
 * differ, so every list can be replaced through configuration.
 */

export interface ChatSurfaceSelectors {
  /** Buttons that open a file chooser */
  uploadTriggers: string[];
  /** File inputs that accept the video directly */
  fileInputs: string[];
  /** Prompt text boxes */
  promptInputs: string[];
  /** Send buttons (Enter is pressed when none is visible) */
  sendButtons: string[];
  /** Assistant answer containers; the last match is the latest answer */
  responses: string[];
  /** Fields that only appear on a login form */
  credentialFields: string[];
  /** URL fragments of login pages */
  loginUrlPatterns: string[];
}

export const DEFAULT_CHAT_SELECTORS: ChatSurfaceSelectors = {
  uploadTriggers: [
    'button:has-text("Upload")',
    '[aria-label*="upload" i]',
    '[aria-label*="attach" i]',
    '.upload-button',
    '[data-testid="upload"]',
    'label:has-text("Upload")',
  ],
  fileInputs: ['input[type="file"]'],
  promptInputs: [
    'textarea',
    '[contenteditable="true"]',
    '[placeholder*="message" i]',
    '[data-testid="text-input"]',
    'input[type="text"]',
  ],
  sendButtons: [
    'button[type="submit"]',
    'button:has-text("Send")',
    '[aria-label*="send" i]',
    '.send-button',
  ],
  responses: [
    '[data-role="assistant"]',
    '.assistant-message',
    '.ai-response',
    '.message-content',
    '.response-text',
  ],
  credentialFields: ['input[type="password"]', 'input[name="loginfmt"]', 'input[autocomplete="username"]'],
  loginUrlPatterns: ['/login', '/signin', '/sign-in', '/oauth', 'login.microsoftonline.com'],
};

/**
 * Overlay a partial selector configuration on the defaults
 */
export function resolveSelectors(overrides: Partial<ChatSurfaceSelectors> = {}): ChatSurfaceSelectors {
  return { ...DEFAULT_CHAT_SELECTORS, ...overrides };
}
