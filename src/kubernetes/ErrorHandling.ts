/**
 * Kubernetes Client Error Handling Module
 *
 * Typed errors for cluster reads, conversion from raw client failures,
 * and a monitor that keeps per-type counts for logging.
 */

import { Logger } from 'winston';

/**
 * Base error class for all Kubernetes-related errors
 */
export class KubernetesError extends Error {
  public readonly code: string;
  public readonly statusCode?: number;
  public readonly details: Record<string, unknown>;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: string,
    statusCode?: number,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'KubernetesError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details || {};
    this.timestamp = new Date();

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, KubernetesError.prototype);
  }
}

/**
 * The API group/kind is not served by the cluster, usually because the
 * operator that owns the CRD is not installed.
 */
export class ApiUnavailableError extends KubernetesError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'API_UNAVAILABLE', 404, details || {});
    this.name = 'ApiUnavailableError';
    Object.setPrototypeOf(this, ApiUnavailableError.prototype);
  }
}

/**
 * Error thrown when authentication fails
 */
export class AuthenticationError extends KubernetesError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'AUTHENTICATION_ERROR', 401, details || {});
    this.name = 'AuthenticationError';
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }
}

/**
 * Error thrown when RBAC denies the request
 */
export class AuthorizationError extends KubernetesError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'FORBIDDEN', 403, details || {});
    this.name = 'AuthorizationError';
    Object.setPrototypeOf(this, AuthorizationError.prototype);
  }
}

/**
 * Error thrown when a named object does not exist
 */
export class ResourceNotFoundError extends KubernetesError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NOT_FOUND', 404, details || {});
    this.name = 'ResourceNotFoundError';
    Object.setPrototypeOf(this, ResourceNotFoundError.prototype);
  }
}

/**
 * Error thrown when a tool argument cannot be parsed or is out of range
 */
export class InvalidArgumentError extends KubernetesError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_ARGUMENT', 400, details || {});
    this.name = 'InvalidArgumentError';
    Object.setPrototypeOf(this, InvalidArgumentError.prototype);
  }
}

/**
 * Error thrown when the server is unavailable
 */
export class ServerUnavailableError extends KubernetesError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SERVER_UNAVAILABLE', 503, details || {});
    this.name = 'ServerUnavailableError';
    Object.setPrototypeOf(this, ServerUnavailableError.prototype);
  }
}

/**
 * Error thrown when a timeout occurs
 */
export class TimeoutError extends KubernetesError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'TIMEOUT_ERROR', 408, details || {});
    this.name = 'TimeoutError';
    Object.setPrototypeOf(this, TimeoutError.prototype);
  }
}

/**
 * Error thrown for network-related issues
 */
export class NetworkError extends KubernetesError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NETWORK_ERROR', undefined, details || {});
    this.name = 'NetworkError';
    Object.setPrototypeOf(this, NetworkError.prototype);
  }
}

/**
 * Neither in-cluster credentials nor a kubeconfig file could be loaded
 */
export class ClusterConnectionError extends KubernetesError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CLUSTER_CONNECTION_ERROR', undefined, details || {});
    this.name = 'ClusterConnectionError';
    Object.setPrototypeOf(this, ClusterConnectionError.prototype);
  }
}

/**
 * What was being read when a client call failed. `resource` is the
 * human-readable kind label used in messages.
 */
export interface ApiErrorContext {
  operation: 'list' | 'get' | 'read';
  resource: string;
  name?: string;
  namespace?: string;
}

const NETWORK_ERROR_CODES = new Set(['ECONNREFUSED', 'ENOTFOUND', 'ETIMEDOUT', 'ECONNRESET']);

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readStatusCode(error: Record<string, unknown>): number | undefined {
  if (typeof error.statusCode === 'number') return error.statusCode;
  const response = error.response;
  if (isRecord(response) && typeof response.statusCode === 'number') return response.statusCode;
  if (typeof error.code === 'number') return error.code;
  return undefined;
}

function readBody(error: Record<string, unknown>): unknown {
  if (error.body !== undefined) return error.body;
  const response = error.response;
  return isRecord(response) ? response.body : undefined;
}

function parseBody(body: unknown): unknown {
  if (typeof body !== 'string') return body;
  try {
    return JSON.parse(body);
  } catch {
    return body;
  }
}

/**
 * A 404 Status naming the requested object means the object is absent.
 * Any other 404 (plain "page not found", or a Status about the kind) means
 * the kind itself is not served.
 */
function isObjectNotFound(body: unknown, context?: ApiErrorContext): boolean {
  if (!context || context.operation === 'list' || !isRecord(body)) return false;
  if (body.reason !== 'NotFound') return false;
  const details = body.details;
  if (!isRecord(details) || typeof details.name !== 'string') return false;
  return context.name === undefined || details.name === context.name;
}

function describeTarget(context?: ApiErrorContext): string {
  if (!context) return 'resource';
  const scope = context.namespace ? ` in namespace '${context.namespace}'` : '';
  return context.name
    ? `${context.resource} '${context.name}'${scope}`
    : `${context.resource}${scope}`;
}

/**
 * Convert Kubernetes client failures to typed errors
 */
export function convertApiError(error: unknown, context?: ApiErrorContext): KubernetesError {
  if (error instanceof KubernetesError) return error;
  if (!isRecord(error) && !(error instanceof Error)) {
    return new KubernetesError(String(error), 'UNKNOWN_ERROR');
  }

  const raw: Record<string, unknown> = isRecord(error) ? error : {};
  const rawMessage =
    error instanceof Error ? error.message : typeof raw.message === 'string' ? raw.message : '';
  const statusCode = readStatusCode(raw);
  const body = parseBody(readBody(raw));
  const target = describeTarget(context);

  if (statusCode !== undefined) {
    const apiMessage =
      isRecord(body) && typeof body.message === 'string' ? body.message : rawMessage;
    const details: Record<string, unknown> = {
      ...(context ?? {}),
      reason: isRecord(body) ? body.reason : undefined,
      apiMessage,
    };

    switch (statusCode) {
      case 401:
        return new AuthenticationError(
          `Unauthorized to read ${target}; check cluster credentials`,
          details,
        );
      case 403:
        return new AuthorizationError(
          `Forbidden: not allowed to ${context?.operation ?? 'read'} ${target}`,
          details,
        );
      case 404:
        if (isObjectNotFound(body, context)) {
          return new ResourceNotFoundError(`${target} not found`, details);
        }
        return new ApiUnavailableError(
          `${context?.resource ?? 'Resource'} API is not available on this cluster (is the operator installed?)`,
          details,
        );
      case 408:
        return new TimeoutError(`Timed out reading ${target}`, details);
      case 500:
      case 502:
      case 503:
      case 504:
        return new ServerUnavailableError(
          `API server unavailable while reading ${target} (HTTP ${statusCode})`,
          details,
        );
      default:
        return new KubernetesError(
          `Failed to read ${target}: ${apiMessage || `HTTP ${statusCode}`}`,
          'API_ERROR',
          statusCode,
          details,
        );
    }
  }

  if (typeof raw.code === 'string' && NETWORK_ERROR_CODES.has(raw.code)) {
    return new NetworkError(`Cannot reach the API server: ${rawMessage || raw.code}`, {
      code: raw.code,
    });
  }

  if (rawMessage.toLowerCase().includes('timeout') || rawMessage.includes('timed out')) {
    return new TimeoutError(rawMessage);
  }

  return new KubernetesError(rawMessage || 'Unknown error', 'UNKNOWN_ERROR', undefined, {
    originalError: String(error),
  });
}

/**
 * Render any failure as the single-line text returned to tool callers
 */
export function toErrorReport(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return `Error: ${message}`;
}

/**
 * Error statistics tracking
 */
export interface ErrorStats {
  total: number;
  byType: Record<string, number>;
  byStatusCode: Record<number, number>;
  lastError?: {
    message: string;
    code: string;
    timestamp: Date;
  };
}

/**
 * Counts tool failures by type and status code and logs each one
 */
export class ErrorMonitor {
  private stats: ErrorStats = {
    total: 0,
    byType: {},
    byStatusCode: {},
  };

  constructor(private logger?: Logger) {}

  /**
   * Record an error
   */
  recordError(error: KubernetesError, operation: string): void {
    this.stats.total++;

    this.stats.byType[error.name] = (this.stats.byType[error.name] || 0) + 1;

    if (error.statusCode) {
      this.stats.byStatusCode[error.statusCode] =
        (this.stats.byStatusCode[error.statusCode] || 0) + 1;
    }

    this.stats.lastError = {
      message: error.message,
      code: error.code,
      timestamp: error.timestamp,
    };

    this.logger?.error(`[${operation}] ${error.name}: ${error.message}`, {
      code: error.code,
      statusCode: error.statusCode,
      details: error.details,
    });
  }

  /**
   * Get error statistics
   */
  getStats(): ErrorStats {
    return { ...this.stats };
  }
}
