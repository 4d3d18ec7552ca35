/**
 * Error taxonomy for the playback core.
 *
 * None of these terminate the process: commands catch them and return a
 * failed CommandResult, the bus logs SubscriberErrors, and shutdown logs
 * everything as a warning. ConfigError is the one error thrown to callers.
 */

export type PlaybackErrorCode =
  | "ENGINE_ERROR"
  | "SOURCE_UNAVAILABLE"
  | "NAVIGATION_ERROR"
  | "SUBSCRIBER_ERROR"
  | "TRANSITION_ERROR"
  | "CONFIG_ERROR";

export class PlaybackError extends Error {
  constructor(
    message: string,
    public readonly code: PlaybackErrorCode,
    public readonly context?: Record<string, unknown>,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "PlaybackError";
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/** An engine or source failed to start, stop, pause or resume. */
export class EngineError extends PlaybackError {
  constructor(message: string, context?: Record<string, unknown>, cause?: unknown) {
    super(message, "ENGINE_ERROR", context, cause);
    this.name = "EngineError";
  }
}

/** The targeted source is not registered or not loaded. */
export class SourceUnavailableError extends PlaybackError {
  constructor(public readonly sourceName: string, message = `Source not available: ${sourceName}`) {
    super(message, "SOURCE_UNAVAILABLE", { source: sourceName });
    this.name = "SourceUnavailableError";
  }
}

/** Navigation was attempted on an empty playlist. */
export class NavigationError extends PlaybackError {
  constructor(message = "No tracks in playlist") {
    super(message, "NAVIGATION_ERROR");
    this.name = "NavigationError";
  }
}

/** An event handler threw or rejected. Isolated to that handler. */
export class SubscriberError extends PlaybackError {
  constructor(public readonly eventType: string, cause: unknown) {
    super(
      `Subscriber for ${eventType} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      "SUBSCRIBER_ERROR",
      { eventType },
      cause,
    );
    this.name = "SubscriberError";
  }
}

/** The command is not valid in the current player state. */
export class TransitionError extends PlaybackError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "TRANSITION_ERROR", context);
    this.name = "TransitionError";
  }
}

/** Configuration failed validation. */
export class ConfigError extends PlaybackError {
  constructor(message: string, public readonly issues: string[]) {
    super(message, "CONFIG_ERROR", { issues });
    this.name = "ConfigError";
  }
}

/** Outcome of a transport command. Failures carry the error instead of throwing it. */
export type CommandResult = { ok: true } | { ok: false; error: PlaybackError };

export const ok: CommandResult = { ok: true };

export function fail(error: PlaybackError): CommandResult {
  return { ok: false, error };
}

/** Wrap anything thrown by an engine or source as an EngineError. */
export function toEngineError(err: unknown, message: string, context?: Record<string, unknown>): EngineError {
  if (err instanceof EngineError) return err;
  const detail = err instanceof Error ? err.message : String(err);
  return new EngineError(`${message}: ${detail}`, context, err);
}
