/**
 * Error taxonomy for an analysis run.
 *
 * Loader and configuration errors are fatal: the run produces no output.
 * InvariantViolation signals a defect in the pipeline wiring, not bad input.
 */

export class MalformedExportError extends Error {
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super(details.length > 0 ? `${message}: ${details.join('; ')}` : message);
    this.name = 'MalformedExportError';
    this.details = details;
  }
}

export class MalformedMessageError extends Error {
  readonly conversationId: string;
  readonly messageIndex: number;

  constructor(conversationId: string, messageIndex: number, reason: string) {
    super(`Conversation "${conversationId}" message ${messageIndex}: ${reason}`);
    this.name = 'MalformedMessageError';
    this.conversationId = conversationId;
    this.messageIndex = messageIndex;
  }
}

export class InvalidPatternError extends Error {
  readonly category: string;
  readonly pattern: string;

  constructor(category: string, pattern: string, reason: string) {
    super(`Invalid pattern for "${category}" (${pattern}): ${reason}`);
    this.name = 'InvalidPatternError';
    this.category = category;
    this.pattern = pattern;
  }
}

export class PatternRegistrationClosedError extends Error {
  constructor(what: string) {
    super(`Cannot register ${what}: configuration has already been built`);
    this.name = 'PatternRegistrationClosedError';
  }
}

export class InvariantViolation extends Error {
  constructor(message: string) {
    super(`Invariant violated: ${message}`);
    this.name = 'InvariantViolation';
  }
}
