/**
 * Meson composer. The 64-bit flavours (primary, AVX2, AVX512) configure
 * separate build directories in the primary tree; the 32-bit and special
 * builds run in copied trees.
 */

import { PgoPhase } from '../pgo';
import { Variant } from '../variant_matrix';
import { Composer, composeDialect } from './compose';
import { ComposeContext, Dialect, cmd, copiedTreeLocation, parallelFlag, primaryTreeLocation } from './steps';

const IN_PRIMARY_TREE: readonly Variant[] = ['Default64', 'AVX2', 'AVX512'];

export function mesonBuildDir(variant: Variant): string {
    if (variant === 'AVX2') return 'builddiravx2';
    if (variant === 'AVX512') return 'builddiravx512';
    return 'builddir';
}

function libdir(variant: Variant): string {
    switch (variant) {
        case 'AVX2': return 'lib64/haswell';
        case 'AVX512': return 'lib64/haswell/avx512_1';
        case 'ThirtyTwoBit':
        case 'Special32':
            return 'lib32';
        default: return 'lib64';
    }
}

function mesonArgs(ctx: ComposeContext, variant: Variant, phase: PgoPhase | null): string[] {
    const s = ctx.config.settings;
    switch (variant) {
        case 'ThirtyTwoBit':
        case 'Special32':
            return [s.extra_configure, s.extra_configure32];
        case 'AVX2':
            return [s.extra_configure, s.extra_configure64, s.extra_configure_avx2];
        case 'AVX512':
            return [s.extra_configure, s.extra_configure64, s.extra_configure_avx512];
        case 'Special':
            return [s.extra_configure_special];
        case 'Special2':
            return [s.extra_configure_special2];
        case 'OpenMPI':
            return [s.extra_configure_openmpi];
        case 'Default64':
            if (phase === 'USE' && (s.extra_configure_pgo || s.extra_configure64_pgo)) {
                return [s.extra_configure_pgo, s.extra_configure64_pgo];
            }
            return [s.extra_configure, s.extra_configure64];
    }
}

const mesonDialect: Dialect = {
    location: (ctx, variant) => IN_PRIMARY_TREE.includes(variant)
        ? primaryTreeLocation(ctx.config)
        : copiedTreeLocation(ctx.config, variant),
    configure: (ctx, variant, phase) => [
        cmd(
            'CFLAGS="$CFLAGS" CXXFLAGS="$CXXFLAGS" LDFLAGS="$LDFLAGS" LIBS="$LIBS" meson',
            `--libdir=${libdir(variant)}`,
            '--sysconfdir=/usr/share --prefix=/usr --buildtype=plain -Ddefault_library=both',
            ...mesonArgs(ctx, variant, phase),
            mesonBuildDir(variant),
        ),
    ],
    build: (ctx, variant) => [cmd('ninja --verbose', parallelFlag(ctx.config), '-C', mesonBuildDir(variant))],
    install: (_ctx, variant) => [`DESTDIR=%{buildroot} ninja -C ${mesonBuildDir(variant)} install`],
    clean: () => ["find builddir/ -type f,l -not -name '*.gcno' -not -name 'statuspgo*' -delete -print || :"],
};

export const composeMeson: Composer = ctx =>
    composeDialect(ctx, mesonDialect, { copied: v => !IN_PRIMARY_TREE.includes(v) });
