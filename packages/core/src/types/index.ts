/**
 * Type exports for @reelscope/core
 */

export type { WorkItem, PhaseCounts, SleepFn } from './common.js';
export type { StoreRow, TabularStore } from './store.js';
export type { AutomationSurface } from './surface.js';
