/**
 * Build Configuration
 *
 * The read-only bag of named options, settings, snippets and macro overrides
 * that selects variants and PGO mode for one synthesis call. Names come from
 * the catalogue in data/build_options.json, which also supplies the defaults.
 *
 * A configuration is never mutated in place. The convergence driver derives a
 * new one with `withOption` when it needs to flip a flag between rounds.
 */

import catalogue from './data/build_options.json';

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type OptionName = keyof typeof catalogue.options;
export type SettingName = keyof typeof catalogue.settings;
export type SnippetName = keyof typeof catalogue.snippets;
export type MacroName = keyof typeof catalogue.macros;

export interface LicenseFile {
    /** Path relative to %{_builddir}. */
    path: string;
    /** Content hash used as the installed file name. */
    hash: string;
}

export interface BuildConfiguration {
    readonly name: string;
    readonly version: string;
    readonly options: Readonly<Record<OptionName, boolean>>;
    readonly settings: Readonly<Record<SettingName, string>>;
    readonly snippets: Readonly<Record<SnippetName, readonly string[]>>;
    readonly macros: Readonly<Record<MacroName, readonly string[]>>;
    /** Patch entries, `file [options]`. */
    readonly patches: readonly string[];
    /** Patches applied inside an extra version's tree, keyed by version. */
    readonly version_patches: Readonly<Record<string, readonly string[]>>;
    /** Check-phase command; empty when the package has no tests. */
    readonly tests: string;
    readonly license_files: readonly LicenseFile[];
    readonly locales: readonly string[];
    readonly source_date_epoch: number;
}

export interface BuildConfigurationInput {
    name: string;
    version?: string;
    options?: Partial<Record<OptionName, boolean>>;
    settings?: Partial<Record<SettingName, string>>;
    snippets?: Partial<Record<SnippetName, readonly string[]>>;
    macros?: Partial<Record<MacroName, readonly string[]>>;
    patches?: readonly string[];
    version_patches?: Record<string, readonly string[]>;
    tests?: string;
    license_files?: readonly LicenseFile[];
    locales?: readonly string[];
    source_date_epoch?: number;
}

/* -------------------------------------------------------------------------- */
/* Construction                                                               */
/* -------------------------------------------------------------------------- */

export function createBuildConfiguration(input: BuildConfigurationInput): BuildConfiguration {
    return {
        name: input.name,
        version: input.version ?? '',
        options: { ...catalogue.options, ...input.options },
        settings: { ...catalogue.settings, ...input.settings },
        snippets: { ...catalogue.snippets, ...input.snippets },
        macros: { ...catalogue.macros, ...input.macros },
        patches: [...(input.patches ?? [])],
        version_patches: { ...input.version_patches },
        tests: input.tests ?? '',
        license_files: [...(input.license_files ?? [])],
        locales: [...(input.locales ?? [])],
        source_date_epoch: input.source_date_epoch ?? 0,
    };
}

/** Copy of `config` with one option replaced. */
export function withOption(config: BuildConfiguration, name: OptionName, value: boolean): BuildConfiguration {
    return { ...config, options: { ...config.options, [name]: value } };
}

/* -------------------------------------------------------------------------- */
/* Catalogue lookups                                                          */
/* -------------------------------------------------------------------------- */

const has = (group: object, name: string): boolean => Object.prototype.hasOwnProperty.call(group, name);

export function isOptionName(name: string): name is OptionName {
    return has(catalogue.options, name);
}

export function isSettingName(name: string): name is SettingName {
    return has(catalogue.settings, name);
}

export function isSnippetName(name: string): name is SnippetName {
    return has(catalogue.snippets, name);
}

export function isMacroName(name: string): name is MacroName {
    return has(catalogue.macros, name);
}

/** True when the macro override carries at least one line. */
export function hasMacro(config: BuildConfiguration, name: MacroName): boolean {
    return config.macros[name].length > 0;
}

/** True when the snippet carries at least one line. */
export function hasSnippet(config: BuildConfiguration, name: SnippetName): boolean {
    return config.snippets[name].length > 0;
}
