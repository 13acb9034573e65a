export class LLMNotSet extends Error {
  constructor() {
    super('LLM is not set');
    this.name = 'LLMNotSet';
  }
}

export class LLMNotSupported extends Error {
  readonly modelName: string;
  readonly capabilities: readonly string[];

  constructor(modelName: string, capabilities: readonly string[]) {
    super(
      `LLM model '${modelName}' does not support required capabilities: ${capabilities.join(', ')}.`
    );
    this.name = 'LLMNotSupported';
    this.modelName = modelName;
    this.capabilities = capabilities;
  }
}

export class MaxStepsReached extends Error {
  readonly steps: number;

  constructor(steps: number) {
    super(`Max number of steps reached: ${steps}`);
    this.name = 'MaxStepsReached';
    this.steps = steps;
  }
}

/** The turn was cancelled through its AbortSignal. */
export class RunCancelled extends Error {
  constructor() {
    super('The agent turn was cancelled');
    this.name = 'RunCancelled';
  }
}

export class NoActiveTurnError extends Error {
  constructor() {
    super('No agent turn is in progress');
    this.name = 'NoActiveTurnError';
  }
}

export class TurnInProgressError extends Error {
  constructor() {
    super('An agent turn is already in progress');
    this.name = 'TurnInProgressError';
  }
}
