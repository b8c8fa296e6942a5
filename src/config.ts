/**
 * Shared Configuration Constants
 *
 * Process-wide settings for synthesis and convergence.
 * Values can be overridden via environment variables.
 */

// Convergence: the driver stops once the round counter passes this value
export const MAX_ROUNDS = parseInt(process.env.FORGE_MAX_ROUNDS || '20', 10);

// Fixed SOURCE_DATE_EPOCH; empty means "take it from options.json"
export const SOURCE_DATE_EPOCH_OVERRIDE = process.env.FORGE_SOURCE_DATE_EPOCH || '';

// Per-package configuration file inside the target directory
export const PACKAGE_CONFIG_FILE = 'options.json';

// Ledger database inside the target directory
export const LEDGER_FILE = process.env.FORGE_LEDGER_FILE || '.recipe-forge.db';

// Sandbox
export const SANDBOX = {
    MOCK_BIN: process.env.FORGE_MOCK_BIN || 'mock',
    DEFAULT_CHROOT: 'clear',
    TIMEOUT_MS: parseInt(process.env.FORGE_SANDBOX_TIMEOUT_MS || '14400000', 10), // 4 hours
    RESULTS_DIR: 'results',
};

// Logs the sandbox writes into results/, archived as round<N>-<name>.log
export const ROUND_LOGS = ['build', 'root', 'srpm-build', 'srpm-root', 'mock_srpm', 'mock_build'] as const;

// Target lock
export const LOCK = {
    FILE: '.recipe-forge.lock',
    TIMEOUT_MS: parseInt(process.env.FORGE_LOCK_TIMEOUT_MS || '5000', 10),
    STALE_TTL_MS: 6 * 60 * 60 * 1000, // longer than any sandbox build
};
