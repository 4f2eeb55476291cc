/**
 * Interface for the hosted model API client
 */
export interface IReasoningClient {
  /** Model identifier sent with every request */
  readonly model: string;

  /**
   * Send an assembled prompt and return the completion text.
   * Rejects with UpstreamError on any failure.
   */
  generate(prompt: string, abortSignal?: AbortSignal): Promise<string>;

  /**
   * Check that the API is reachable with the configured key
   */
  healthCheck(): Promise<boolean>;
}
