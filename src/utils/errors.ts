/** A collaborator cannot be used because its credentials or settings are missing. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * The turn finished without any assistant text to return. Fatal for the
 * request, unlike tool failures which are folded back into the conversation.
 */
export class TurnFailedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TurnFailedError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
