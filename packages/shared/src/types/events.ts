/**
 * Base interface for all shellgate events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Identifier of the guard session that produced the event */
  sessionId: string;
  /** Event type discriminator */
  type: string;
}

/**
 * Emitted once when a guard session has resolved its policy.
 */
export interface SessionStarted extends BaseEvent {
  type: 'SessionStarted';
  payload: {
    /** Name of the policy preset in effect */
    policy: string;
    /** Absolute project root the session is confined to */
    projectRoot: string;
    allowedProgramCount: number;
    deniedPatternCount: number;
  };
}

/**
 * Emitted for every command that passes through the checkpoint.
 */
export interface CommandClassified extends BaseEvent {
  type: 'CommandClassified';
  payload: {
    /** The proposed command, after secret redaction */
    command: string;
    decision: 'allow' | 'deny';
    /** Rule that fired on deny */
    rule?: string;
    reason?: string;
    detail?: string;
  };
}

export type ShellgateEvent = SessionStarted | CommandClassified;
