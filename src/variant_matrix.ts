/**
 * Variant Matrix
 *
 * Expands a configuration into the ordered list of variant builds. The
 * canonical order below is the install order: auxiliary variants first, the
 * primary 64-bit build last so its files win on shared paths. %build runs
 * the primary tree first (see `buildOrder`), since every copied tree is a
 * snapshot of it taken in %prep.
 */

import { BuildConfiguration, OptionName } from './build_config';

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export const VARIANTS = [
    'ThirtyTwoBit',
    'Special32',
    'AVX512',
    'AVX2',
    'OpenMPI',
    'Special',
    'Special2',
    'Default64',
] as const;

export type Variant = typeof VARIANTS[number];

const ENABLE_BIT: Record<Variant, OptionName | null> = {
    ThirtyTwoBit: '32bit',
    Special32: 'build_special_32',
    AVX512: 'use_avx512',
    AVX2: 'use_avx2',
    OpenMPI: 'openmpi',
    Special: 'build_special',
    Special2: 'build_special2',
    Default64: null,
};

/** Copied source tree each variant builds in, as a sibling of the primary tree. */
const TREE_DIRS: Record<Variant, string | null> = {
    ThirtyTwoBit: 'build32',
    Special32: 'build-special-32',
    AVX512: 'buildavx512',
    AVX2: 'buildavx2',
    OpenMPI: 'build-openmpi',
    Special: 'build-special',
    Special2: 'build-special2',
    Default64: null,
};

/* -------------------------------------------------------------------------- */
/* Expansion                                                                  */
/* -------------------------------------------------------------------------- */

export function isEnabled(variant: Variant, config: BuildConfiguration): boolean {
    if (variant === 'Default64') return !config.options['32bit_only'];
    if (variant === 'Special32') return config.options['32bit'] && config.options.build_special_32;
    const bit = ENABLE_BIT[variant];
    return bit !== null && config.options[bit];
}

/** Enabled variants in canonical order. */
export function expand(config: BuildConfiguration): Variant[] {
    return VARIANTS.filter(v => isEnabled(v, config));
}

/** Order of %build blocks: the primary build first, then the rest as given. */
export function buildOrder(variants: readonly Variant[]): Variant[] {
    const rest = variants.filter(v => v !== 'Default64');
    return variants.includes('Default64') ? ['Default64', ...rest] : rest;
}

export function isThirtyTwoBit(variant: Variant): boolean {
    return variant === 'ThirtyTwoBit' || variant === 'Special32';
}

export function isSpecial(variant: Variant): boolean {
    return variant === 'Special' || variant === 'Special2';
}

export function treeDir(variant: Variant): string | null {
    return TREE_DIRS[variant];
}

/** `pushd` target for a variant's copied tree, honoring `subdir`. */
export function treePath(variant: Variant, subdir: string): string | null {
    const dir = TREE_DIRS[variant];
    if (dir === null) return null;
    return subdir ? `../${dir}/${subdir}` : `../${dir}`;
}
