import { z } from 'zod';
import { SuffixOverflowError } from '../features/screenplay/suffix.js';

// Error categories for better organization and handling
export enum ErrorCategory {
  PARSING = 'parsing',
  VALIDATION = 'validation',
  FILE_SYSTEM = 'file_system',
  UNKNOWN = 'unknown'
}

// Error severity levels
export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

// User-friendly error message templates
const ERROR_MESSAGES = {
  [ErrorCategory.PARSING]: {
    title: 'Screenplay Processing Error',
    message: 'The screenplay could not be regrouped by setup.',
    suggestions: ['Split long runs of one setup inside a scene with a scene heading', 'Check the setup markers around the reported scene']
  },
  [ErrorCategory.VALIDATION]: {
    title: 'Invalid Arguments',
    message: 'The command line arguments are not valid.',
    suggestions: ['Run with --help to see the accepted options']
  },
  [ErrorCategory.FILE_SYSTEM]: {
    title: 'File System Error',
    message: 'There was an issue reading or writing files.',
    suggestions: ['Check the input path exists', 'Check file permissions', 'Choose a different output location']
  },
  [ErrorCategory.UNKNOWN]: {
    title: 'Unexpected Error',
    message: 'An unexpected error occurred.',
    suggestions: ['Try again', 'Report the issue with the input file attached']
  }
};

// Enhanced error information
export interface ErrorReport {
  id: string;
  timestamp: Date;
  category: ErrorCategory;
  severity: ErrorSeverity;
  originalError: Error;
  context?: Record<string, unknown>;
  userMessage: {
    title: string;
    message: string;
    suggestions: string[];
  };
  stackTrace?: string;
}

// Error reporting configuration
export interface ErrorReporterConfig {
  enableConsoleLogging?: boolean;
  maxStoredReports?: number;
}

// Error statistics for monitoring
export interface ErrorStats {
  totalErrors: number;
  errorsByCategory: Record<ErrorCategory, number>;
  errorsBySeverity: Record<ErrorSeverity, number>;
}

// Zod schema for error report validation
const ErrorReportSchema = z.object({
  id: z.string(),
  timestamp: z.date(),
  category: z.nativeEnum(ErrorCategory),
  severity: z.nativeEnum(ErrorSeverity),
  originalError: z.instanceof(Error),
  context: z.record(z.unknown()).optional(),
  userMessage: z.object({
    title: z.string(),
    message: z.string(),
    suggestions: z.array(z.string())
  }),
  stackTrace: z.string().optional()
});

function errnoCode(error: Error): string | undefined {
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'string' ? code : undefined;
}

/**
 * Centralized error reporting for the CLI. Holds reports in memory only; no timers, so a
 * process that owns a reporter still exits on its own.
 */
export class ErrorReporter {
  private reports: ErrorReport[] = [];
  private config: Required<ErrorReporterConfig>;

  constructor(config: ErrorReporterConfig = {}) {
    this.config = {
      enableConsoleLogging: true,
      maxStoredReports: 100,
      ...config
    };
  }

  /**
   * Report a new error with automatic categorization and user-friendly messaging
   */
  report(
    error: Error,
    options: {
      category?: ErrorCategory;
      severity?: ErrorSeverity;
      context?: Record<string, unknown>;
    } = {}
  ): ErrorReport {
    const category = options.category ?? this.categorizeError(error);
    const severity = options.severity ?? this.determineSeverity(category);

    const report: ErrorReport = {
      id: this.generateErrorId(),
      timestamp: new Date(),
      category,
      severity,
      originalError: error,
      context: options.context,
      userMessage: ERROR_MESSAGES[category],
      stackTrace: error.stack
    };

    const checked = ErrorReportSchema.safeParse(report);
    if (!checked.success) {
      // Continue with the report even if validation fails
      console.error('Error report validation failed:', checked.error.message);
    }

    this.reports.push(report);
    if (this.reports.length > this.config.maxStoredReports) {
      this.reports = this.reports.slice(-this.config.maxStoredReports);
    }

    if (this.config.enableConsoleLogging) {
      this.logToConsole(report);
    }

    return report;
  }

  private categorizeError(error: Error): ErrorCategory {
    if (error instanceof SuffixOverflowError) return ErrorCategory.PARSING;
    if (error instanceof z.ZodError) return ErrorCategory.VALIDATION;

    const code = errnoCode(error);
    if (code && /^E[A-Z]+$/.test(code)) return ErrorCategory.FILE_SYSTEM;

    return ErrorCategory.UNKNOWN;
  }

  private determineSeverity(category: ErrorCategory): ErrorSeverity {
    switch (category) {
      case ErrorCategory.VALIDATION:
        return ErrorSeverity.MEDIUM;
      case ErrorCategory.PARSING:
      case ErrorCategory.FILE_SYSTEM:
        return ErrorSeverity.HIGH;
      default:
        return ErrorSeverity.CRITICAL;
    }
  }

  private generateErrorId(): string {
    return `error-${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
  }

  /**
   * Log error to console with appropriate formatting
   */
  private logToConsole(report: ErrorReport): void {
    const logMethod = report.severity === ErrorSeverity.MEDIUM ? 'warn' :
                     report.severity === ErrorSeverity.LOW ? 'info' : 'error';

    console.group(`🚨 ${report.userMessage.title} (${report.category})`);
    console[logMethod]('Error:', report.originalError.message);
    console.info('Suggestions:', report.userMessage.suggestions.join('; '));
    if (report.context) {
      console.info('Context:', report.context);
    }
    console.groupEnd();
  }

  getStats(): ErrorStats {
    const errorsByCategory = Object.values(ErrorCategory).reduce((acc, category) => {
      acc[category] = this.reports.filter(r => r.category === category).length;
      return acc;
    }, {} as Record<ErrorCategory, number>);

    const errorsBySeverity = Object.values(ErrorSeverity).reduce((acc, severity) => {
      acc[severity] = this.reports.filter(r => r.severity === severity).length;
      return acc;
    }, {} as Record<ErrorSeverity, number>);

    return {
      totalErrors: this.reports.length,
      errorsByCategory,
      errorsBySeverity
    };
  }

  getReports(filters?: { category?: ErrorCategory; severity?: ErrorSeverity }): ErrorReport[] {
    let filtered = this.reports;
    if (filters?.category) {
      filtered = filtered.filter(r => r.category === filters.category);
    }
    if (filters?.severity) {
      filtered = filtered.filter(r => r.severity === filters.severity);
    }
    return filtered;
  }

  clearReports(): void {
    this.reports = [];
  }
}
