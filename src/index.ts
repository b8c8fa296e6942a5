/**
 * Main entry point - exports all public APIs
 */

export type { BuildConfiguration, BuildConfigurationInput, LicenseFile, OptionName, SettingName, SnippetName, MacroName } from './build_config';
export { createBuildConfiguration, withOption } from './build_config';
export type { BuildSystemKind } from './kinds';
export { BUILD_SYSTEM_KINDS, KIND_TRAITS, parseBuildSystemKind } from './kinds';
export type { Variant } from './variant_matrix';
export { VARIANTS, expand, buildOrder } from './variant_matrix';
export type { PgoMode, PgoPhase, PgoStep } from './pgo';
export { resolvePgoMode, externalPhase, markerPath } from './pgo';
export type { DecisionTable, BuildDecision, InstallDecision } from './decision_table';
export { planSteps } from './decision_table';
export type { SectionName } from './directive_stream';
export { DirectiveStream } from './directive_stream';
export type { SourceSeed, ArchiveSource, VersionSource } from './source_layout';
export { SourceLayout, emptySeed } from './source_layout';
export { synthesize, composerFor } from './synthesizer';
export type { PackageConfig } from './package_config';
export { loadPackageConfig, parsePackageConfig } from './package_config';
export type { ValidationResult, JsonSchema } from './schema_validator';
export { SchemaValidator } from './schema_validator';
export type { RecipeDocument, RecipeHeader } from './recipe_io/recipe_writer';
export { renderRecipe, writeRecipe } from './recipe_io/recipe_writer';
export type { FileClassifier } from './file_classifier';
export { PackagedFileList } from './file_classifier';
export type { SandboxBuilder, SandboxRequest, SandboxOutcome } from './sandbox';
export { MockSandbox, parseUnpackagedFiles } from './sandbox';
export { archiveRoundLogs } from './log_archive';
export type { RoundRecord, RunRecord, RunState } from './round_ledger';
export { RoundLedger } from './round_ledger';
export type { RoundAction, RoundDecision } from './round_policy';
export { RoundPolicy } from './round_policy';
export type { DriverOptions, DriverResult, RunStatus } from './convergence_driver';
export { ConvergenceDriver } from './convergence_driver';
export type { ErrorCode, StructuredError } from './structured_error';
export { RecipeError, ErrorFactory } from './structured_error';
export type { Logger } from './logger';
export { createLogger } from './logger';
