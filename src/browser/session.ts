// ── Automation protocol ──────────────────────────────────────
// The subset of a remote browser-automation session the pipeline relies on.
// One session owns exactly one page, so callers must go through
// SerialSession rather than sharing the raw handle between tasks.

export interface SessionElement {
  text(): Promise<string>;
  attribute(name: string): Promise<string | null>;
  click(): Promise<void>;
  sendKeys(text: string): Promise<void>;
  scrollIntoView(): Promise<void>;
}

export interface AutomationSession {
  navigate(url: string): Promise<void>;
  currentUrl(): Promise<string>;
  find(selector: string): Promise<SessionElement | null>;
  findAll(selector: string): Promise<SessionElement[]>;
  /** Resolves `null` when the element does not appear within `timeoutMs`. */
  waitFor(selector: string, timeoutMs: number): Promise<SessionElement | null>;
  /** Full markup of the current page. */
  content(): Promise<string>;
  executeScript(script: string): Promise<unknown>;
  close(): Promise<void>;
}
