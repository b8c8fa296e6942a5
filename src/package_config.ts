/**
 * Package Configuration Loader
 *
 * Reads `<target>/options.json`, validates it against a schema generated
 * from the option catalogue and turns it into the synthesis inputs: the
 * build system kind, a BuildConfiguration and the SourceLayout seed.
 * Unknown option, setting, snippet or macro names are rejected.
 */

import * as fs from 'fs';
import * as path from 'path';
import catalogue from './data/build_options.json';
import {
    BuildConfiguration,
    BuildConfigurationInput,
    LicenseFile,
    MacroName,
    OptionName,
    SettingName,
    SnippetName,
    createBuildConfiguration,
    isMacroName,
    isOptionName,
    isSettingName,
    isSnippetName,
} from './build_config';
import { PACKAGE_CONFIG_FILE, SOURCE_DATE_EPOCH_OVERRIDE } from './config';
import { BuildSystemKind, parseBuildSystemKind } from './kinds';
import { JsonSchema, SchemaValidator } from './schema_validator';
import { ArchiveSource, SourceSeed, VersionSource, emptySeed } from './source_layout';
import { ErrorFactory } from './structured_error';

export interface PackageConfig {
    kind: BuildSystemKind;
    config: BuildConfiguration;
    seed: SourceSeed;
}

/* -------------------------------------------------------------------------- */
/* Schema                                                                     */
/* -------------------------------------------------------------------------- */

export const PACKAGE_SCHEMA_ID = 'package-config';

const STRING: JsonSchema = { type: 'string' };
const STRING_LIST: JsonSchema = { type: 'array', items: STRING };

function closedGroup(names: string[], value: JsonSchema): JsonSchema {
    const properties: Record<string, JsonSchema> = {};
    for (const name of names) properties[name] = value;
    return { type: 'object', properties, additionalProperties: false };
}

export function packageSchema(): JsonSchema {
    return {
        type: 'object',
        required: ['name', 'url', 'kind'],
        additionalProperties: false,
        properties: {
            name: { type: 'string', pattern: '^[A-Za-z0-9][A-Za-z0-9._+-]*$' },
            version: STRING,
            url: STRING,
            kind: STRING,
            source_date_epoch: { type: 'number', minimum: 0 },
            options: closedGroup(Object.keys(catalogue.options), { type: 'boolean' }),
            settings: closedGroup(Object.keys(catalogue.settings), STRING),
            snippets: closedGroup(Object.keys(catalogue.snippets), STRING_LIST),
            macros: closedGroup(Object.keys(catalogue.macros), STRING_LIST),
            patches: STRING_LIST,
            version_patches: { type: 'object', additionalProperties: STRING_LIST },
            tests: STRING,
            locales: STRING_LIST,
            license_files: {
                type: 'array',
                items: { type: 'object', required: ['path', 'hash'], properties: { path: STRING, hash: STRING } },
            },
            sources: {
                type: 'object',
                additionalProperties: false,
                properties: {
                    prefix: STRING,
                    tarball_prefix: STRING,
                    archives: {
                        type: 'array',
                        items: {
                            type: 'object',
                            required: ['url'],
                            properties: { url: STRING, prefix: STRING, destination: STRING },
                        },
                    },
                    versions: {
                        type: 'array',
                        items: {
                            type: 'object',
                            required: ['url', 'version', 'source_index'],
                            properties: { url: STRING, version: STRING, prefix: STRING, source_index: { type: 'number', minimum: 1 } },
                        },
                    },
                    godep: STRING_LIST,
                    godep_versions: STRING_LIST,
                    gem_subdir: STRING,
                },
            },
        },
    };
}

const validator = new SchemaValidator();
validator.registerSchema(PACKAGE_SCHEMA_ID, packageSchema());

/* -------------------------------------------------------------------------- */
/* Narrowing helpers                                                          */
/* -------------------------------------------------------------------------- */

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function record(value: unknown): Record<string, unknown> {
    return isRecord(value) ? value : {};
}

function str(rec: Record<string, unknown>, key: string): string {
    const value = rec[key];
    return typeof value === 'string' ? value : '';
}

function strList(value: unknown): string[] {
    return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

function records(value: unknown): Record<string, unknown>[] {
    return Array.isArray(value) ? value.filter(isRecord) : [];
}

/* -------------------------------------------------------------------------- */
/* Conversion                                                                 */
/* -------------------------------------------------------------------------- */

function resolveEpoch(raw: Record<string, unknown>, override: string): number {
    if (override) {
        const parsed = parseInt(override, 10);
        if (!Number.isNaN(parsed)) return parsed;
    }
    const value = raw.source_date_epoch;
    return typeof value === 'number' ? Math.floor(value) : 0;
}

function toInput(raw: Record<string, unknown>, epoch: number): BuildConfigurationInput {
    const options: Partial<Record<OptionName, boolean>> = {};
    for (const [key, value] of Object.entries(record(raw.options))) {
        if (isOptionName(key) && typeof value === 'boolean') options[key] = value;
    }
    const settings: Partial<Record<SettingName, string>> = {};
    for (const [key, value] of Object.entries(record(raw.settings))) {
        if (isSettingName(key) && typeof value === 'string') settings[key] = value;
    }
    const snippets: Partial<Record<SnippetName, string[]>> = {};
    for (const [key, value] of Object.entries(record(raw.snippets))) {
        if (isSnippetName(key)) snippets[key] = strList(value);
    }
    const macros: Partial<Record<MacroName, string[]>> = {};
    for (const [key, value] of Object.entries(record(raw.macros))) {
        if (isMacroName(key)) macros[key] = strList(value);
    }
    const versionPatches: Record<string, string[]> = {};
    for (const [version, value] of Object.entries(record(raw.version_patches))) {
        versionPatches[version] = strList(value);
    }
    const licenses: LicenseFile[] = records(raw.license_files).map(r => ({ path: str(r, 'path'), hash: str(r, 'hash') }));

    return {
        name: str(raw, 'name'),
        version: str(raw, 'version'),
        options,
        settings,
        snippets,
        macros,
        patches: strList(raw.patches),
        version_patches: versionPatches,
        tests: str(raw, 'tests'),
        license_files: licenses,
        locales: strList(raw.locales),
        source_date_epoch: epoch,
    };
}

function toSeed(raw: Record<string, unknown>): SourceSeed {
    const sources = record(raw.sources);
    const seed = emptySeed(str(raw, 'url'));
    seed.prefix = str(sources, 'prefix');
    seed.tarball_prefix = str(sources, 'tarball_prefix') || seed.prefix;
    seed.archives = records(sources.archives).map((a): ArchiveSource => ({
        url: str(a, 'url'),
        prefix: str(a, 'prefix'),
        destination: str(a, 'destination'),
    }));
    seed.versions = records(sources.versions).map((v): VersionSource => ({
        url: str(v, 'url'),
        version: str(v, 'version'),
        prefix: str(v, 'prefix'),
        source_index: typeof v.source_index === 'number' ? v.source_index : 0,
    }));
    seed.godep = strList(sources.godep);
    seed.godep_versions = strList(sources.godep_versions);
    seed.gem_subdir = str(sources, 'gem_subdir');
    return seed;
}

/* -------------------------------------------------------------------------- */
/* Public API                                                                 */
/* -------------------------------------------------------------------------- */

/** Validate an already-parsed options document. `file` only labels errors. */
export function parsePackageConfig(raw: unknown, file: string = PACKAGE_CONFIG_FILE, epochOverride: string = SOURCE_DATE_EPOCH_OVERRIDE): PackageConfig {
    const result = validator.validate(raw, PACKAGE_SCHEMA_ID);
    if (!result.valid || !isRecord(raw)) {
        throw ErrorFactory.invalidPackageConfig(file, result.errors.map(e => `${e.path || '.'}: ${e.message}`));
    }
    return {
        kind: parseBuildSystemKind(str(raw, 'kind')),
        config: createBuildConfiguration(toInput(raw, resolveEpoch(raw, epochOverride))),
        seed: toSeed(raw),
    };
}

export function packageConfigPath(target: string): string {
    return path.join(target, PACKAGE_CONFIG_FILE);
}

export function loadPackageConfig(target: string, epochOverride: string = SOURCE_DATE_EPOCH_OVERRIDE): PackageConfig {
    const file = packageConfigPath(target);
    if (!fs.existsSync(file)) throw ErrorFactory.configNotFound(file);

    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw ErrorFactory.invalidPackageConfig(file, [`not valid JSON: ${message}`]);
    }
    return parsePackageConfig(raw, file, epochOverride);
}
