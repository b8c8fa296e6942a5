/**
 * Decision table
 *
 * Everything a composer branches on is resolved here, before any directive
 * is written: which variants build, in which order, what each step does about
 * PGO and which macro overrides replace which default command. Composers then
 * walk the table and emit.
 */

import { BuildConfiguration, MacroName, hasMacro } from './build_config';
import { BuildSystemKind, KIND_TRAITS } from './kinds';
import { PgoMode, PgoStep, assertPgoConsistent, pgoStepFor, resolvePgoMode } from './pgo';
import { Variant, buildOrder, expand } from './variant_matrix';

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

/** Overrides that apply to one step; a key is present only when the override has lines. */
export interface StepOverrides {
    configure?: MacroName;
    make?: MacroName;
    /** Replacements used for the profile-use half of a PGO step. */
    configure_use?: MacroName;
    make_use?: MacroName;
}

export interface BuildDecision {
    variant: Variant;
    pgo: PgoStep;
    overrides: StepOverrides;
}

export interface InstallDecision {
    variant: Variant;
    pgo: PgoStep;
    override?: MacroName;
}

export interface DecisionTable {
    kind: BuildSystemKind;
    pgo_mode: PgoMode;
    /** Variants in canonical order. */
    variants: Variant[];
    build: BuildDecision[];
    install: InstallDecision[];
}

/* -------------------------------------------------------------------------- */
/* Override names                                                             */
/* -------------------------------------------------------------------------- */

const CONFIGURE_MACROS: Record<Variant, MacroName> = {
    Default64: 'configure_macro',
    ThirtyTwoBit: 'configure_macro_32',
    Special32: 'configure_macro_32',
    AVX512: 'configure_macro',
    AVX2: 'configure_macro',
    OpenMPI: 'configure_macro_openmpi',
    Special: 'configure_macro_special',
    Special2: 'configure_macro_special2',
};

const CMAKE_MACROS: Record<Variant, MacroName> = {
    Default64: 'cmake_macro',
    ThirtyTwoBit: 'cmake_macro_32',
    Special32: 'cmake_macro_32',
    AVX512: 'cmake_macro',
    AVX2: 'cmake_macro',
    OpenMPI: 'configure_macro_openmpi',
    Special: 'cmake_macro_special',
    Special2: 'cmake_macro_special',
};

const MAKE_MACROS: Record<Variant, MacroName> = {
    Default64: 'make_macro',
    ThirtyTwoBit: 'make_macro_32',
    Special32: 'make_macro_32',
    AVX512: 'make_macro',
    AVX2: 'make_macro',
    OpenMPI: 'make_macro',
    Special: 'make_macro_special',
    Special2: 'make_macro_special2',
};

const INSTALL_MACROS: Record<Variant, MacroName> = {
    Default64: 'install_macro',
    ThirtyTwoBit: 'install_macro_32',
    Special32: 'install_macro_32',
    AVX512: 'install_macro_512',
    AVX2: 'install_macro_avx2',
    OpenMPI: 'install_macro_openmpi',
    Special: 'install_macro_build_special',
    Special2: 'install_macro_build_special2',
};

function present(config: BuildConfiguration, name: MacroName | undefined): MacroName | undefined {
    return name !== undefined && hasMacro(config, name) ? name : undefined;
}

function configureMacro(kind: BuildSystemKind, variant: Variant): MacroName | undefined {
    switch (KIND_TRAITS[kind].configureMacros) {
        case 'configure': return CONFIGURE_MACROS[variant];
        case 'cmake': return CMAKE_MACROS[variant];
        case 'none': return undefined;
    }
}

function configureUseMacro(kind: BuildSystemKind, variant: Variant): MacroName | undefined {
    if (variant !== 'Default64') return configureMacro(kind, variant);
    switch (KIND_TRAITS[kind].configureMacros) {
        case 'configure': return 'configure_macro_pgo';
        case 'cmake': return 'cmake_macro_pgo';
        case 'none': return undefined;
    }
}

function makeMacro(kind: BuildSystemKind, variant: Variant): MacroName {
    return KIND_TRAITS[kind].buildMacros === 'cargo' ? 'cargo_build_macro' : MAKE_MACROS[variant];
}

function makeUseMacro(kind: BuildSystemKind, variant: Variant): MacroName {
    if (variant !== 'Default64') return makeMacro(kind, variant);
    return KIND_TRAITS[kind].buildMacros === 'cargo' ? 'cargo_build_macro_pgo' : 'make_macro_pgo';
}

/** The USE half falls back to the base override when no PGO-specific one is set. */
function firstPresent(config: BuildConfiguration, ...names: (MacroName | undefined)[]): MacroName | undefined {
    for (const name of names) {
        const hit = present(config, name);
        if (hit) return hit;
    }
    return undefined;
}

export function installMacro(variant: Variant): MacroName {
    return INSTALL_MACROS[variant];
}

/* -------------------------------------------------------------------------- */
/* Planning                                                                   */
/* -------------------------------------------------------------------------- */

export function planSteps(kind: BuildSystemKind, config: BuildConfiguration): DecisionTable {
    assertPgoConsistent(config, kind);

    const supported = KIND_TRAITS[kind].variants;
    const variants = expand(config).filter(v => supported.includes(v));
    const mode = resolvePgoMode(config, kind);

    const build = buildOrder(variants).map((variant): BuildDecision => {
        const overrides: StepOverrides = {};
        const configure = present(config, configureMacro(kind, variant));
        const make = present(config, makeMacro(kind, variant));
        const configureUse = firstPresent(config, configureUseMacro(kind, variant), configureMacro(kind, variant));
        const makeUse = firstPresent(config, makeUseMacro(kind, variant), makeMacro(kind, variant));
        if (configure) overrides.configure = configure;
        if (make) overrides.make = make;
        if (configureUse) overrides.configure_use = configureUse;
        if (makeUse) overrides.make_use = makeUse;
        return { variant, pgo: pgoStepFor(mode, config, variant), overrides };
    });

    const install = variants.map((variant): InstallDecision => {
        const override = present(config, installMacro(variant));
        const decision: InstallDecision = { variant, pgo: pgoStepFor(mode, config, variant) };
        if (override) decision.override = override;
        return decision;
    });

    return { kind, pgo_mode: mode, variants, build, install };
}

/** Decision for one variant, when the kind builds it. */
export function buildDecisionFor(table: DecisionTable, variant: Variant): BuildDecision | undefined {
    return table.build.find(d => d.variant === variant);
}
