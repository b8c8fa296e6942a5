/**
 * Build system kinds and what each one supports.
 */

import { ErrorFactory } from './structured_error';
import { Variant } from './variant_matrix';

export const BUILD_SYSTEM_KINDS = [
    'make',
    'configure',
    'configure_ac',
    'autogen',
    'cmake',
    'meson',
    'scons',
    'waf',
    'qmake',
    'cargo',
    'golang',
    'godep',
    'ruby',
    'cpan',
    'distutils3',
    'distutils36',
    'pyproject',
    'R',
    'buildtcl_script',
    'buildtcl_configure',
    'phpize',
    'nginx',
] as const;

export type BuildSystemKind = typeof BUILD_SYSTEM_KINDS[number];

export function isBuildSystemKind(tag: string): tag is BuildSystemKind {
    return BUILD_SYSTEM_KINDS.some(k => k === tag);
}

export function parseBuildSystemKind(tag: string): BuildSystemKind {
    if (!isBuildSystemKind(tag)) throw ErrorFactory.unknownBuildSystem(tag);
    return tag;
}

/** Compile-time exhaustiveness guard for switches over closed unions. */
export function assertNever(value: never): never {
    throw ErrorFactory.unknownBuildSystem(String(value));
}

/* -------------------------------------------------------------------------- */
/* Traits                                                                     */
/* -------------------------------------------------------------------------- */

export interface KindTraits {
    /** Variants the kind knows how to build; the rest are ignored even when enabled. */
    variants: readonly Variant[];
    /** Whether PGO can apply at all. */
    pgo: boolean;
    /** Macro family used for the configure step's overrides. */
    configureMacros: 'configure' | 'cmake' | 'none';
    /** Macro family used for the build step's overrides. */
    buildMacros: 'make' | 'cargo';
}

const ALL: readonly Variant[] = ['ThirtyTwoBit', 'Special32', 'AVX512', 'AVX2', 'OpenMPI', 'Special', 'Special2', 'Default64'];
const PRIMARY: readonly Variant[] = ['Default64'];

const autotools: KindTraits = { variants: ALL, pgo: true, configureMacros: 'configure', buildMacros: 'make' };
const buildtcl: KindTraits = {
    variants: ['ThirtyTwoBit', 'Special', 'Special2', 'Default64'],
    pgo: false,
    configureMacros: 'configure',
    buildMacros: 'make',
};
const single: KindTraits = { variants: PRIMARY, pgo: false, configureMacros: 'none', buildMacros: 'make' };
const python: KindTraits = { variants: ['AVX2', 'Default64'], pgo: false, configureMacros: 'none', buildMacros: 'make' };

export const KIND_TRAITS: Record<BuildSystemKind, KindTraits> = {
    make: { ...autotools, configureMacros: 'none' },
    configure: autotools,
    configure_ac: autotools,
    autogen: autotools,
    cmake: {
        variants: ['ThirtyTwoBit', 'AVX512', 'AVX2', 'OpenMPI', 'Special', 'Default64'],
        pgo: true,
        configureMacros: 'cmake',
        buildMacros: 'make',
    },
    meson: {
        variants: ['ThirtyTwoBit', 'AVX512', 'AVX2', 'Special', 'Default64'],
        pgo: true,
        configureMacros: 'configure',
        buildMacros: 'make',
    },
    waf: { variants: ['AVX2', 'Special', 'Default64'], pgo: true, configureMacros: 'configure', buildMacros: 'make' },
    qmake: { variants: ['AVX2', 'Special', 'Default64'], pgo: false, configureMacros: 'configure', buildMacros: 'make' },
    cargo: { variants: PRIMARY, pgo: true, configureMacros: 'none', buildMacros: 'cargo' },
    scons: single,
    golang: single,
    godep: single,
    ruby: single,
    cpan: single,
    distutils3: python,
    distutils36: single,
    pyproject: python,
    R: single,
    buildtcl_script: buildtcl,
    buildtcl_configure: buildtcl,
    phpize: single,
    nginx: single,
};
