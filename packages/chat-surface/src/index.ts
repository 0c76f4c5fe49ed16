/**
 * @reelscope/chat-surface
 *
 * Automation surface for the AI chat interface.
 */

export type { AutomationSurface } from '@reelscope/core';

// Selectors
export { DEFAULT_CHAT_SELECTORS, resolveSelectors } from './selectors.js';
export type { ChatSurfaceSelectors } from './selectors.js';

// Session
export { SessionTokenStore, hasValidSession, DEFAULT_SESSION_PATH } from './session-token.js';

// Playwright implementation
export { PlaywrightChatSurface } from './playwright-surface.js';
export type { PlaywrightChatSurfaceOptions } from './playwright-surface.js';

// Login
export { interactiveLogin } from './login.js';
export type { InteractiveLoginOptions, LoginSurface } from './login.js';

// Testing
export { ScriptedChatSurface } from './testing/scripted-surface.js';
export type { ScriptedStep, ScriptedCall } from './testing/scripted-surface.js';
