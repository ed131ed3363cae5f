/**
 * Error taxonomy and retry handling for the trading core
 * Classifies failures into recoverable and fatal classes and retries the recoverable ones
 */

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

export enum ErrorCategory {
  NETWORK = 'network',
  AUTHENTICATION = 'authentication',
  VALIDATION = 'validation',
  EXCHANGE_REJECTION = 'exchange_rejection',
  SEQUENCE = 'sequence',
  RISK = 'risk',
  CONFIGURATION = 'configuration',
  SYSTEM = 'system'
}

export enum RecoveryStrategy {
  RETRY = 'retry',
  RESYNC = 'resync',
  FAIL_FAST = 'fail_fast',
  HALT = 'halt'
}

export interface ErrorContext {
  operation: string;
  component: string;
  instrument?: string;
  clientOrderId?: string;
  timestamp: Date;
  metadata?: Record<string, unknown>;
}

export interface RecoveryAction {
  strategy: RecoveryStrategy;
  maxAttempts?: number;
  backoffMs?: number;
  maxBackoffMs?: number;
}

export type ErrorHandlingResult<T> =
  | { success: true; result: T; recoveryAttempts: number; strategyUsed: RecoveryStrategy }
  | { success: false; error: ApplicationError; recoveryAttempts: number; strategyUsed: RecoveryStrategy };

interface ApplicationErrorOptions {
  originalError?: unknown;
  isRetryable?: boolean;
  userMessage?: string;
}

export function makeContext(operation: string, component: string, extra: Partial<ErrorContext> = {}): ErrorContext {
  return { operation, component, timestamp: new Date(), ...extra };
}

/**
 * Base error with classification and recovery context
 */
export class ApplicationError extends Error {
  public readonly code: string;
  public readonly category: ErrorCategory;
  public readonly severity: ErrorSeverity;
  public readonly context: ErrorContext;
  public readonly originalError?: unknown;
  public readonly isRetryable: boolean;
  public readonly isFatal: boolean;
  public readonly userMessage: string;
  public readonly technicalMessage: string;

  constructor(
    message: string,
    code: string,
    category: ErrorCategory,
    severity: ErrorSeverity,
    context: ErrorContext,
    options: ApplicationErrorOptions = {}
  ) {
    super(message);
    this.name = 'ApplicationError';
    this.code = code;
    this.category = category;
    this.severity = severity;
    this.context = context;
    this.originalError = options.originalError;
    this.isRetryable = options.isRetryable ?? this.determineRetryability();
    this.isFatal = category === ErrorCategory.AUTHENTICATION || category === ErrorCategory.CONFIGURATION;
    this.technicalMessage = message;
    this.userMessage = options.userMessage ?? this.generateUserMessage();
  }

  private determineRetryability(): boolean {
    if (this.category === ErrorCategory.NETWORK) {
      return true;
    }
    if (this.category === ErrorCategory.SYSTEM && this.severity !== ErrorSeverity.CRITICAL) {
      return true;
    }
    return false;
  }

  private generateUserMessage(): string {
    switch (this.category) {
      case ErrorCategory.NETWORK:
        return 'Exchange connection issue. The request will be retried.';
      case ErrorCategory.AUTHENTICATION:
        return 'Exchange authentication failed. Trading has been halted; verify API credentials and system clock.';
      case ErrorCategory.VALIDATION:
        return 'Invalid order parameters.';
      case ErrorCategory.EXCHANGE_REJECTION:
        return 'The exchange rejected the order.';
      case ErrorCategory.SEQUENCE:
        return 'Market data gap detected. State is being resynchronized.';
      case ErrorCategory.RISK:
        return 'Order blocked by risk limits.';
      case ErrorCategory.CONFIGURATION:
        return 'Invalid configuration. Trading cannot start.';
      default:
        return 'An unexpected error occurred.';
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      category: this.category,
      severity: this.severity,
      context: this.context,
      isRetryable: this.isRetryable,
      isFatal: this.isFatal,
      userMessage: this.userMessage
    };
  }
}

/**
 * Network failure or throttling; retried with backoff
 */
export class TransientNetworkError extends ApplicationError {
  constructor(message: string, context: ErrorContext, code: string = 'NETWORK_ERROR', originalError?: unknown) {
    super(message, code, ErrorCategory.NETWORK, ErrorSeverity.MEDIUM, context, {
      originalError,
      isRetryable: true
    });
    this.name = 'TransientNetworkError';
  }
}

/**
 * Credentials, signature or clock skew rejected; halts trading
 */
export class AuthError extends ApplicationError {
  constructor(message: string, context: ErrorContext, code: string = 'AUTHENTICATION_ERROR', originalError?: unknown) {
    super(message, code, ErrorCategory.AUTHENTICATION, ErrorSeverity.CRITICAL, context, {
      originalError,
      isRetryable: false
    });
    this.name = 'AuthError';
  }
}

/**
 * Order-specific rejection from the exchange; terminal for that order only
 */
export class ExchangeRejection extends ApplicationError {
  public readonly exchangeCode: string;

  constructor(message: string, exchangeCode: string, context: ErrorContext) {
    super(message, 'EXCHANGE_REJECTION', ErrorCategory.EXCHANGE_REJECTION, ErrorSeverity.MEDIUM, context, {
      isRetryable: false
    });
    this.name = 'ExchangeRejection';
    this.exchangeCode = exchangeCode;
  }
}

/**
 * Book version gap or corrupt book; the instrument is resynced, trading continues
 */
export class SequenceGapError extends ApplicationError {
  public readonly expected?: number;
  public readonly received?: number;

  constructor(message: string, context: ErrorContext, expected?: number, received?: number) {
    super(message, 'SEQUENCE_GAP', ErrorCategory.SEQUENCE, ErrorSeverity.LOW, context, {
      isRetryable: false
    });
    this.name = 'SequenceGapError';
    this.expected = expected;
    this.received = received;
  }
}

/**
 * Intent dropped by the risk gate before any exchange interaction
 */
export class RiskViolation extends ApplicationError {
  public readonly reason: string;

  constructor(reason: string, detail: string, context: ErrorContext) {
    super(detail, 'RISK_VIOLATION', ErrorCategory.RISK, ErrorSeverity.LOW, context, {
      isRetryable: false
    });
    this.name = 'RiskViolation';
    this.reason = reason;
  }
}

export class ConfigurationError extends ApplicationError {
  constructor(message: string, context: ErrorContext = makeContext('loadConfiguration', 'ConfigurationManager')) {
    super(message, 'CONFIGURATION_ERROR', ErrorCategory.CONFIGURATION, ErrorSeverity.CRITICAL, context, {
      isRetryable: false
    });
    this.name = 'ConfigurationError';
  }
}

export interface ErrorHandlerOptions {
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  circuitBreakerThreshold?: number;
  circuitBreakerResetMs?: number;
}

interface CircuitBreaker {
  isOpen: boolean;
  failures: number;
  lastFailure: Date;
}

const DEFAULT_RECOVERY_ACTION: RecoveryAction = {
  strategy: RecoveryStrategy.RETRY,
  maxAttempts: 3,
  backoffMs: 1000
};

/**
 * Runs operations with classification, retry with backoff, and per-operation circuit breaking
 */
export class ErrorHandler {
  private errorMetrics: Map<string, { count: number; lastOccurrence: Date }> = new Map();
  private circuitBreakers: Map<string, CircuitBreaker> = new Map();
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private readonly circuitBreakerThreshold: number;
  private readonly circuitBreakerResetMs: number;

  constructor(options: ErrorHandlerOptions = {}) {
    this.sleep = options.sleep ?? (ms => new Promise(resolve => setTimeout(resolve, ms)));
    this.random = options.random ?? Math.random;
    this.circuitBreakerThreshold = options.circuitBreakerThreshold ?? 5;
    this.circuitBreakerResetMs = options.circuitBreakerResetMs ?? 60000;
  }

  /**
   * Runs an operation, retrying retryable failures
   */
  async handleError<T>(
    operation: () => Promise<T>,
    context: ErrorContext,
    recoveryAction?: RecoveryAction
  ): Promise<ErrorHandlingResult<T>> {
    const strategy = recoveryAction ?? DEFAULT_RECOVERY_ACTION;
    const maxAttempts = strategy.maxAttempts ?? 3;
    let recoveryAttempts = 0;

    if (this.isCircuitBreakerOpen(context.operation)) {
      return {
        success: false,
        error: new TransientNetworkError(
          `Circuit breaker is open for ${context.operation}`,
          context,
          'CIRCUIT_BREAKER_OPEN'
        ),
        recoveryAttempts: 0,
        strategyUsed: RecoveryStrategy.FAIL_FAST
      };
    }

    for (;;) {
      try {
        const result = await operation();
        this.resetCircuitBreaker(context.operation);
        return { success: true, result, recoveryAttempts, strategyUsed: strategy.strategy };
      } catch (error) {
        recoveryAttempts++;
        const wrapped = this.wrapError(error, context);
        this.recordErrorMetrics(wrapped);

        if (wrapped.category === ErrorCategory.NETWORK) {
          this.updateCircuitBreaker(context.operation);
        }

        const shouldRetry =
          strategy.strategy === RecoveryStrategy.RETRY &&
          wrapped.isRetryable &&
          recoveryAttempts <= maxAttempts;

        if (!shouldRetry) {
          return {
            success: false,
            error: wrapped,
            recoveryAttempts,
            strategyUsed: wrapped.isFatal ? RecoveryStrategy.HALT : strategy.strategy
          };
        }

        await this.sleep(
          this.calculateBackoffDelay(recoveryAttempts, strategy.backoffMs ?? 1000, strategy.maxBackoffMs ?? 30000)
        );
      }
    }
  }

  /**
   * Runs an operation and throws the classified error on failure
   */
  async execute<T>(operation: () => Promise<T>, context: ErrorContext, recoveryAction?: RecoveryAction): Promise<T> {
    const outcome = await this.handleError(operation, context, recoveryAction);
    if (!outcome.success) {
      throw outcome.error;
    }
    return outcome.result;
  }

  /**
   * Wraps raw errors into ApplicationError with context
   */
  wrapError(error: unknown, context: ErrorContext): ApplicationError {
    if (error instanceof ApplicationError) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    const lower = message.toLowerCase();

    if (
      lower.includes('network') ||
      lower.includes('timeout') ||
      lower.includes('econnreset') ||
      lower.includes('econnrefused') ||
      lower.includes('fetch failed') ||
      lower.includes('socket')
    ) {
      return new TransientNetworkError(message, context, 'NETWORK_ERROR', error);
    }

    if (lower.includes('signature') || lower.includes('credential') || lower.includes('unauthorized')) {
      return new AuthError(message, context, 'AUTHENTICATION_ERROR', error);
    }

    if (lower.includes('invalid') || lower.includes('validation')) {
      return new ApplicationError(message, 'VALIDATION_ERROR', ErrorCategory.VALIDATION, ErrorSeverity.LOW, context, {
        originalError: error
      });
    }

    return new ApplicationError(message, 'UNKNOWN_ERROR', ErrorCategory.SYSTEM, ErrorSeverity.HIGH, context, {
      originalError: error,
      isRetryable: false
    });
  }

  /**
   * Exponential backoff with up to 10% jitter
   */
  calculateBackoffDelay(attempt: number, baseDelay: number, maxDelay: number = 30000): number {
    const delay = Math.min(baseDelay * Math.pow(2, attempt - 1), maxDelay);
    return delay * (1 + this.random() * 0.1);
  }

  private recordErrorMetrics(error: ApplicationError): void {
    const key = `${error.category}:${error.code}`;
    const existing = this.errorMetrics.get(key) ?? { count: 0, lastOccurrence: new Date() };

    this.errorMetrics.set(key, {
      count: existing.count + 1,
      lastOccurrence: new Date()
    });
  }

  private isCircuitBreakerOpen(operation: string): boolean {
    const breaker = this.circuitBreakers.get(operation);
    if (!breaker) return false;

    if (breaker.isOpen && Date.now() - breaker.lastFailure.getTime() > this.circuitBreakerResetMs) {
      breaker.isOpen = false;
      breaker.failures = 0;
    }

    return breaker.isOpen;
  }

  private updateCircuitBreaker(operation: string): void {
    const breaker = this.circuitBreakers.get(operation) ?? { isOpen: false, failures: 0, lastFailure: new Date() };

    breaker.failures++;
    breaker.lastFailure = new Date();

    if (breaker.failures >= this.circuitBreakerThreshold) {
      breaker.isOpen = true;
    }

    this.circuitBreakers.set(operation, breaker);
  }

  private resetCircuitBreaker(operation: string): void {
    const breaker = this.circuitBreakers.get(operation);
    if (breaker) {
      breaker.isOpen = false;
      breaker.failures = 0;
    }
  }

  getErrorMetrics(): Map<string, { count: number; lastOccurrence: Date }> {
    return new Map(this.errorMetrics);
  }

  /**
   * True when any operation's breaker is currently open
   */
  hasOpenCircuit(): boolean {
    for (const operation of this.circuitBreakers.keys()) {
      if (this.isCircuitBreakerOpen(operation)) {
        return true;
      }
    }
    return false;
  }
}

