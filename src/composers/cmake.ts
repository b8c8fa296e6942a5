/**
 * CMake composer. Every variant configures out of tree in its own
 * `clr-build*` directory inside the primary tree, so %prep copies nothing.
 */

import { PgoPhase } from '../pgo';
import { Variant } from '../variant_matrix';
import { Composer, composeDialect } from './compose';
import { ComposeContext, Dialect, Location, Stage, cmd, makeInstallLine, makeLine } from './steps';

const BUILD_DIRS: Record<Variant, string> = {
    Default64: 'clr-build',
    ThirtyTwoBit: 'clr-build32',
    Special32: 'clr-build32',
    AVX512: 'clr-build-avx512',
    AVX2: 'clr-build-avx2',
    OpenMPI: 'clr-build-openmpi',
    Special: 'clr-build-special',
    Special2: 'clr-build-special',
};

export function cmakeBuildDir(variant: Variant): string {
    return BUILD_DIRS[variant];
}

function location(ctx: ComposeContext, variant: Variant, stage: Stage): Location {
    const subdir = ctx.config.settings.subdir;
    const dir = BUILD_DIRS[variant];
    const enter = [
        ...(subdir ? [`pushd ${subdir}`] : []),
        ...(stage === 'build' ? [`mkdir -p ${dir}`] : []),
        `pushd ${dir}`,
    ];
    const leave = ['popd', ...(subdir ? ['popd'] : [])];
    return { enter, leave };
}

const OPENMPI_CMAKE = [
    'cmake -G "Unix Makefiles" -DCMAKE_INSTALL_PREFIX=$MPI_ROOT -DCMAKE_INSTALL_SBINDIR=$MPI_BIN \\',
    '-DCMAKE_INSTALL_LIBDIR=$MPI_LIB -DCMAKE_INSTALL_INCLUDEDIR=$MPI_INCLUDE -DLIB_INSTALL_DIR=$MPI_LIB \\',
    '-DBUILD_SHARED_LIBS:BOOL=ON -DLIB_SUFFIX=64 \\',
    '-DCMAKE_AR=/usr/bin/gcc-ar -DCMAKE_BUILD_TYPE=RelWithDebInfo -DCMAKE_NM=/usr/bin/gcc-nm -DCMAKE_RANLIB=/usr/bin/gcc-ranlib \\',
];

function configure(ctx: ComposeContext, variant: Variant, phase: PgoPhase | null): string[] {
    const s = ctx.config.settings;
    const src = s.cmake_srcdir;
    switch (variant) {
        case 'ThirtyTwoBit':
        case 'Special32':
            return [cmd('%cmake', src, '-DLIB_INSTALL_DIR:PATH=/usr/lib32 -DCMAKE_INSTALL_LIBDIR=/usr/lib32 -DLIB_SUFFIX=32', s.extra_cmake, s.extra_cmake_32)];
        case 'AVX512':
        case 'AVX2':
            return [cmd('%cmake', src, s.extra_cmake)];
        case 'OpenMPI':
            return [...OPENMPI_CMAKE, cmd(src, s.extra_cmake_openmpi)];
        case 'Special':
        case 'Special2':
            return [cmd('%cmake', src, s.extra_cmake_special)];
        case 'Default64':
            if (phase === 'USE' && s.extra_cmake_pgo) return [cmd('%cmake', src, s.extra_cmake_pgo)];
            return [cmd('%cmake', src, s.extra_cmake, s.extra_cmake_64)];
    }
}

const cmakeDialect: Dialect = {
    location,
    configure,
    build: (ctx, variant, phase) => {
        const lines = [makeLine(ctx, variant, phase)];
        if (variant === 'ThirtyTwoBit' || variant === 'Special32') lines.push('unset PKG_CONFIG_PATH');
        return lines;
    },
    install: (ctx, variant) => {
        const line = makeInstallLine(ctx, variant);
        return [variant === 'AVX2' || variant === 'AVX512' || variant === 'Special' ? `${line} || :` : line];
    },
    clean: () => ["find . -type f,l -not -name '*.gcno' -not -name 'statuspgo*' -delete -print"],
};

export const composeCmake: Composer = ctx => composeDialect(ctx, cmakeDialect, { copied: () => false });
