/**
 * Structured Error Schema
 *
 * Machine-readable errors for synthesis and convergence. Each carries a code,
 * a severity and the recovery options the round policy and the CLI act on.
 * Sandbox build failures are not errors here: they travel as outcome values.
 */

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type ErrorCode =
    // Preconditions (never retried)
    | 'UNKNOWN_BUILD_SYSTEM'
    | 'MISSING_SOURCE_LAYOUT'
    | 'PGO_STATE_INCONSISTENT'

    // Configuration
    | 'INVALID_PACKAGE_CONFIG'
    | 'CONFIG_NOT_FOUND'

    // Convergence
    | 'ROUND_BUDGET_EXHAUSTED'

    // Infrastructure
    | 'SANDBOX_UNAVAILABLE'
    | 'LOCK_HELD'
    | 'FILESYSTEM_ERROR'
    | 'LEDGER_ERROR';

export type Severity = 'FATAL' | 'ERROR' | 'WARNING';

export type RecoveryAction =
    | 'fix_package_config'
    | 'inspect_round_logs'
    | 'wait_for_lock'
    | 'install_sandbox'
    | 'abort_run';

export interface RecoveryOption {
    action: RecoveryAction;
    description: string;
}

export interface StructuredError {
    code: ErrorCode;
    message: string;
    severity: Severity;
    context: Record<string, unknown>;
    recovery_options: RecoveryOption[];
    timestamp: string;
}

/* -------------------------------------------------------------------------- */
/* Error Builders                                                             */
/* -------------------------------------------------------------------------- */

export function createStructuredError(
    code: ErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    recoveryOptions: RecoveryOption[] = []
): StructuredError {
    return {
        code,
        message,
        severity: getSeverity(code),
        context,
        recovery_options: recoveryOptions,
        timestamp: new Date().toISOString(),
    };
}

export function getSeverity(code: ErrorCode): Severity {
    const fatalCodes: ErrorCode[] = [
        'UNKNOWN_BUILD_SYSTEM',
        'MISSING_SOURCE_LAYOUT',
        'PGO_STATE_INCONSISTENT',
        'SANDBOX_UNAVAILABLE',
        'FILESYSTEM_ERROR',
    ];

    if (fatalCodes.includes(code)) return 'FATAL';
    return 'ERROR';
}

/** True for the codes that describe a broken input rather than a broken host. */
export function isPrecondition(code: ErrorCode): boolean {
    return code === 'UNKNOWN_BUILD_SYSTEM'
        || code === 'MISSING_SOURCE_LAYOUT'
        || code === 'PGO_STATE_INCONSISTENT'
        || code === 'INVALID_PACKAGE_CONFIG'
        || code === 'CONFIG_NOT_FOUND';
}

/* -------------------------------------------------------------------------- */
/* Throwable wrapper                                                          */
/* -------------------------------------------------------------------------- */

export class RecipeError extends Error {
    constructor(public readonly detail: StructuredError) {
        super(detail.message);
        this.name = 'RecipeError';
    }

    get code(): ErrorCode {
        return this.detail.code;
    }
}

/* -------------------------------------------------------------------------- */
/* Error Factory Methods                                                      */
/* -------------------------------------------------------------------------- */

const fixConfig = (what: string): RecoveryOption => ({
    action: 'fix_package_config',
    description: `Correct ${what} in options.json and rerun`,
});

export class ErrorFactory {
    static unknownBuildSystem(tag: string): RecipeError {
        return new RecipeError(createStructuredError(
            'UNKNOWN_BUILD_SYSTEM',
            `Unknown build system: ${tag}`,
            { tag },
            [fixConfig('"kind"')]
        ));
    }

    static missingSourceLayout(url: string): RecipeError {
        return new RecipeError(createStructuredError(
            'MISSING_SOURCE_LAYOUT',
            `No source layout entry for ${url}`,
            { url },
            [fixConfig('"sources"')]
        ));
    }

    static pgoInconsistent(reason: string, context: Record<string, unknown> = {}): RecipeError {
        return new RecipeError(createStructuredError(
            'PGO_STATE_INCONSISTENT',
            `Inconsistent PGO settings: ${reason}`,
            context,
            [fixConfig('the PGO options')]
        ));
    }

    static invalidPackageConfig(file: string, errors: string[]): RecipeError {
        return new RecipeError(createStructuredError(
            'INVALID_PACKAGE_CONFIG',
            `Invalid package configuration ${file}: ${errors.join('; ')}`,
            { file, errors },
            [fixConfig('the listed fields')]
        ));
    }

    static configNotFound(file: string): RecipeError {
        return new RecipeError(createStructuredError(
            'CONFIG_NOT_FOUND',
            `Package configuration not found: ${file}`,
            { file }
        ));
    }

    static roundBudgetExhausted(rounds: number, limit: number): RecipeError {
        return new RecipeError(createStructuredError(
            'ROUND_BUDGET_EXHAUSTED',
            `Build did not converge within ${limit} rounds (stopped after round ${rounds})`,
            { rounds, limit },
            [{ action: 'inspect_round_logs', description: 'Read results/round<N>-build.log for the repeating restart cause' }]
        ));
    }

    static sandboxUnavailable(command: string, cause: string): RecipeError {
        return new RecipeError(createStructuredError(
            'SANDBOX_UNAVAILABLE',
            `Sandbox command ${command} could not be started: ${cause}`,
            { command, cause },
            [{ action: 'install_sandbox', description: `Install ${command} or point FORGE_MOCK_BIN at it` }]
        ));
    }

    static lockHeld(lockPath: string): RecipeError {
        return new RecipeError(createStructuredError(
            'LOCK_HELD',
            `Another build holds ${lockPath}`,
            { lock_path: lockPath },
            [{ action: 'wait_for_lock', description: 'Wait for the other build to finish' }]
        ));
    }

    static filesystem(operation: string, file: string, cause: string): RecipeError {
        return new RecipeError(createStructuredError(
            'FILESYSTEM_ERROR',
            `${operation} failed for ${file}: ${cause}`,
            { operation, file, cause },
            [{ action: 'abort_run', description: 'Check permissions and free space' }]
        ));
    }

    static ledger(message: string): RecipeError {
        return new RecipeError(createStructuredError('LEDGER_ERROR', message));
    }
}
