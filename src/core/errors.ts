export class FormAssistantError extends Error {
    constructor(
      message: string,
      public code: string,
      public statusCode: number = 500,
      public details?: Record<string, unknown>
    ) {
      super(message);
      this.name = 'FormAssistantError';
      Error.captureStackTrace(this, this.constructor);
    }
  }
  
  export class ConfigurationError extends FormAssistantError {
    constructor(message: string = 'Invalid configuration', details?: Record<string, unknown>) {
      super(message, 'CONFIGURATION_ERROR', 500, details);
      this.name = 'ConfigurationError';
    }
  }
  
  export class InputError extends FormAssistantError {
    constructor(message: string = 'Invalid input', details?: Record<string, unknown>) {
      super(message, 'INPUT_ERROR', 400, details);
      this.name = 'InputError';
    }
  }
  
  export class SessionNotFoundError extends FormAssistantError {
    constructor(sessionId: string) {
      super(`Session not found: ${sessionId}`, 'SESSION_NOT_FOUND', 404, { sessionId });
      this.name = 'SessionNotFoundError';
    }
  }
  
  export class ExtractionError extends FormAssistantError {
    constructor(message: string = 'Extraction backend failed', details?: Record<string, unknown>) {
      super(message, 'EXTRACTION_ERROR', 502, details);
      this.name = 'ExtractionError';
    }
  }

  export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
