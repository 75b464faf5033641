export interface CompleteOptions {
  system?: string;
  /** Ask the backend for a single JSON object. */
  json?: boolean;
}

export interface LLM {
  name: string;
  /** Whether a reasoning backend is configured at all. */
  readonly available: boolean;
  complete(prompt: string, opts?: CompleteOptions): Promise<string>;
}
