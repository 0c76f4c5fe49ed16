/**
 * Scripted Chat Surface
 *
 * In-process stand-in for the chat page. Each submission plays the next
 * script of poll answers and repeats the script's last answer once it runs
 * out. Faults can be queued per step.
 */

import type { AutomationSurface } from '@reelscope/core';

export type ScriptedStep = 'navigate' | 'submitArtifact' | 'submitText' | 'pollText' | 'persistSessionToken';

export interface ScriptedCall {
  step: ScriptedStep | 'close';
  argument?: string;
}

export class ScriptedChatSurface implements AutomationSurface {
  readonly calls: ScriptedCall[] = [];
  private readonly faults = new Map<ScriptedStep, Error[]>();
  private submissions = 0;
  private pollIndex = 0;
  private tokenPresent: boolean;
  closed = false;

  /**
   * @param scripts - poll answers per submission; the last script is reused
   *   for any further submissions
   */
  constructor(
    private readonly scripts: readonly (readonly string[])[] = [],
    options: { sessionToken?: boolean } = {}
  ) {
    this.tokenPresent = options.sessionToken ?? true;
  }

  /** Queue an error thrown by the next `times` calls of a step */
  failNext(step: ScriptedStep, error: Error, times = 1): this {
    const queue = this.faults.get(step) ?? [];
    for (let i = 0; i < times; i++) queue.push(error);
    this.faults.set(step, queue);
    return this;
  }

  /** Number of prompts sent */
  get submissionCount(): number {
    return this.submissions;
  }

  /** Artifacts attached, in order */
  get artifacts(): string[] {
    return this.calls
      .filter(call => call.step === 'submitArtifact')
      .map(call => call.argument ?? '');
  }

  async navigate(target: string): Promise<void> {
    this.record('navigate', target);
  }

  async submitArtifact(artifactRef: string): Promise<void> {
    this.record('submitArtifact', artifactRef);
  }

  async submitText(prompt: string): Promise<void> {
    this.record('submitText', prompt);
    this.submissions++;
    this.pollIndex = 0;
  }

  async pollText(): Promise<string> {
    this.record('pollText');
    const script = this.scripts[Math.min(this.submissions, this.scripts.length) - 1] ?? [];
    const text = script[Math.min(this.pollIndex, script.length - 1)] ?? '';
    this.pollIndex++;
    return text;
  }

  async sessionTokenPresent(): Promise<boolean> {
    return this.tokenPresent;
  }

  async persistSessionToken(): Promise<void> {
    this.record('persistSessionToken');
    this.tokenPresent = true;
  }

  async loadSessionToken(): Promise<boolean> {
    return this.tokenPresent;
  }

  async close(): Promise<void> {
    this.calls.push({ step: 'close' });
    this.closed = true;
  }

  private record(step: ScriptedStep, argument?: string): void {
    this.calls.push(argument === undefined ? { step } : { step, argument });
    const fault = this.faults.get(step)?.shift();
    if (fault) throw fault;
  }
}
