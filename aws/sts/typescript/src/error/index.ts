/**
 * STS Error Types
 *
 * Error hierarchy for role assumption. Provider faults keep the message STS
 * returned; the code classifies the fault for callers and logs.
 *
 * @module error
 */

/**
 * STS error codes.
 */
export type StsErrorCode =
  | 'CONFIGURATION' // Region, endpoint or client could not be established
  | 'VALIDATION' // Input parameters rejected before any call
  | 'CREDENTIAL' // Base credentials missing or invalid
  | 'SIGNING' // Request signing errors
  | 'TRANSPORT' // Network/HTTP transport errors
  | 'TIMEOUT' // Request timeout
  | 'ACCESS_DENIED' // Caller may not assume the role
  | 'EXPIRED_TOKEN' // Expired base session token
  | 'MALFORMED_POLICY' // Session policy rejected by STS
  | 'PACKED_POLICY_SIZE_EXCEEDED' // Session policy too large
  | 'REGION_DISABLED' // STS not activated in the region
  | 'INVALID_INPUT' // Parameter rejected by STS (duration, external ID, MFA code)
  | 'RATE_LIMITED' // Throttling
  | 'AWS_API' // Other AWS API error
  | 'UNKNOWN'; // Unknown error

/**
 * Base STS error class.
 *
 * @example
 * ```typescript
 * throw new StsError(
 *   'User is not authorized to perform: sts:AssumeRole',
 *   'ACCESS_DENIED',
 *   { providerCode: 'AccessDenied', statusCode: 403 }
 * );
 * ```
 */
export class StsError extends Error {
  /**
   * Error code identifying the error type.
   */
  public readonly code: StsErrorCode;

  /**
   * Whether the failure is transient. Informational only: nothing here retries.
   */
  public readonly retryable: boolean;

  /**
   * Error code exactly as returned by STS (e.g. `AccessDenied`).
   */
  public readonly providerCode?: string;

  /**
   * AWS request ID for tracking and debugging.
   */
  public readonly requestId?: string;

  /**
   * HTTP status code if error came from HTTP response.
   */
  public readonly statusCode?: number;

  constructor(
    message: string,
    code: StsErrorCode,
    details: {
      retryable?: boolean;
      providerCode?: string;
      requestId?: string;
      statusCode?: number;
    } = {}
  ) {
    super(message);
    this.name = 'StsError';
    this.code = code;
    this.retryable = details.retryable ?? false;
    this.providerCode = details.providerCode;
    this.requestId = details.requestId;
    this.statusCode = details.statusCode;

    // Maintain proper stack trace in V8 engines
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, StsError);
    }

    Object.setPrototypeOf(this, StsError.prototype);
  }

  /**
   * Get error code from an error.
   */
  static getCode(error: unknown): StsErrorCode {
    if (error instanceof StsError) {
      return error.code;
    }
    return 'UNKNOWN';
  }

  /**
   * Convert error to a plain object for serialization.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      retryable: this.retryable,
      providerCode: this.providerCode,
      requestId: this.requestId,
      statusCode: this.statusCode,
    };
  }
}

/**
 * Type guard for StsError.
 */
export function isStsError(error: unknown): error is StsError {
  return error instanceof StsError;
}

const XML_ENTITIES: Record<string, string> = {
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&apos;': "'",
  '&amp;': '&',
};

/**
 * Decode the predefined XML entities and numeric character references.
 */
export function decodeXmlEntities(text: string): string {
  return text.replace(/&(?:lt|gt|quot|apos|amp|#\d+|#x[0-9a-fA-F]+);/g, (entity) => {
    if (entity.startsWith('&#x')) {
      return String.fromCodePoint(parseInt(entity.slice(3, -1), 16));
    }
    if (entity.startsWith('&#')) {
      return String.fromCodePoint(parseInt(entity.slice(2, -1), 10));
    }
    return XML_ENTITIES[entity] ?? entity;
  });
}

/**
 * Simple XML element extraction.
 *
 * @internal
 */
function extractElement(xml: string, tag: string): string | undefined {
  const regex = new RegExp(`<${tag}>([^<]*)</${tag}>`, 's');
  const match = xml.match(regex);
  const text = match?.[1]?.trim();
  return text === undefined ? undefined : decodeXmlEntities(text);
}

/**
 * Map an STS XML error response to an StsError.
 *
 * STS returns errors in XML format like:
 * ```xml
 * <ErrorResponse>
 *   <Error>
 *     <Type>Sender</Type>
 *     <Code>AccessDenied</Code>
 *     <Message>User is not authorized...</Message>
 *   </Error>
 *   <RequestId>abc-123</RequestId>
 * </ErrorResponse>
 * ```
 *
 * When the body carries no `<Message>`, the message falls back to the provider
 * code, then to `HTTP <status>`.
 */
export function mapStsError(xml: string, statusCode?: number): StsError {
  const providerCode = extractElement(xml, 'Code');
  const requestId = extractElement(xml, 'RequestId');
  const message =
    extractElement(xml, 'Message') ||
    providerCode ||
    (statusCode !== undefined ? `HTTP ${statusCode}` : 'An unknown error occurred');

  const details = { providerCode, requestId, statusCode };

  switch (providerCode) {
    case 'AccessDenied':
    case 'AccessDeniedException':
      return new StsError(message, 'ACCESS_DENIED', details);

    case 'ExpiredToken':
    case 'ExpiredTokenException':
      return new StsError(message, 'EXPIRED_TOKEN', details);

    case 'MalformedPolicyDocument':
    case 'MalformedPolicyDocumentException':
      return new StsError(message, 'MALFORMED_POLICY', details);

    case 'PackedPolicyTooLarge':
    case 'PackedPolicyTooLargeException':
      return new StsError(message, 'PACKED_POLICY_SIZE_EXCEEDED', details);

    case 'RegionDisabledException':
      return new StsError(message, 'REGION_DISABLED', details);

    case 'InvalidInput':
    case 'ValidationError':
    case 'InvalidParameterValue':
    case 'MissingParameter':
      return new StsError(message, 'INVALID_INPUT', details);

    case 'SignatureDoesNotMatch':
    case 'InvalidClientTokenId':
    case 'IncompleteSignature':
      return new StsError(message, 'CREDENTIAL', details);

    case 'Throttling':
    case 'ThrottlingException':
      return new StsError(message, 'RATE_LIMITED', { ...details, retryable: true });

    case 'InternalFailure':
    case 'ServiceUnavailable':
      return new StsError(message, 'AWS_API', { ...details, retryable: true });

    case 'RequestTimeout':
      return new StsError(message, 'TIMEOUT', { ...details, retryable: true });

    default: {
      const retryable = statusCode !== undefined && (statusCode >= 500 || statusCode === 429);
      return new StsError(message, 'AWS_API', { ...details, retryable });
    }
  }
}

/**
 * Create a configuration error.
 *
 * @example
 * ```typescript
 * throw configurationError('region must be specified');
 * ```
 */
export function configurationError(message: string): StsError {
  return new StsError(message, 'CONFIGURATION');
}

/**
 * Create a validation error for rejected input parameters.
 */
export function validationError(message: string): StsError {
  return new StsError(message, 'VALIDATION');
}

/**
 * Create a credential error.
 */
export function credentialError(message: string): StsError {
  return new StsError(message, 'CREDENTIAL');
}

/**
 * Wrap an unknown error as an StsError.
 *
 * Messages of wrapped `Error` values are kept as they are.
 *
 * @example
 * ```typescript
 * try {
 *   await transport.send(request);
 * } catch (error) {
 *   throw wrapError(error, 'TRANSPORT');
 * }
 * ```
 */
export function wrapError(error: unknown, defaultCode: StsErrorCode = 'UNKNOWN'): StsError {
  if (error instanceof StsError) {
    return error;
  }

  if (error instanceof Error) {
    if (error.name === 'AbortError' || /timeout/i.test(error.name)) {
      return new StsError(error.message, 'TIMEOUT', { retryable: true });
    }

    if (error.name === 'TypeError' && error.message.includes('fetch')) {
      return new StsError(`Network error: ${error.message}`, 'TRANSPORT', { retryable: true });
    }

    return new StsError(error.message, defaultCode);
  }

  return new StsError(String(error), defaultCode);
}
