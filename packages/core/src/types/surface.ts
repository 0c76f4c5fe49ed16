/**
 * Automation Surface contract
 *
 * The browser-side collaborator the completion controller drives. The
 * session token is an opaque blob that is either present or absent.
 */

export interface AutomationSurface {
  /** Open the chat page at the given URL */
  navigate(target: string): Promise<void>;

  /** Attach a local file (the downloaded video) to the chat input */
  submitArtifact(artifactRef: string): Promise<void>;

  /** Type and send the prompt */
  submitText(prompt: string): Promise<void>;

  /** Current text of the latest assistant answer ('' when none yet) */
  pollText(): Promise<string>;

  sessionTokenPresent(): Promise<boolean>;

  /** Save the current browser session for the next run */
  persistSessionToken(): Promise<void>;

  /** Restore a saved session; false when none exists */
  loadSessionToken(): Promise<boolean>;

  /** Release the browser */
  close(): Promise<void>;
}
