/**
 * Closed taxonomy of chat provider failures. Provider adapters convert their SDK errors
 * into these so the retry policy can reason about them without knowing the SDK.
 */

export class ChatProviderError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ChatProviderError';
  }
}

/** The transport failed before a response arrived. */
export class APIConnectionError extends ChatProviderError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'APIConnectionError';
  }
}

export class APITimeoutError extends ChatProviderError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'APITimeoutError';
  }
}

export class APIStatusError extends ChatProviderError {
  readonly statusCode: number;

  constructor(statusCode: number, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'APIStatusError';
    this.statusCode = statusCode;
  }
}

/** The provider answered but the stream carried no content and no tool calls. */
export class APIEmptyResponseError extends ChatProviderError {
  constructor(message = 'The API returned an empty response.') {
    super(message);
    this.name = 'APIEmptyResponseError';
  }
}
