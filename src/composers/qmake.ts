/**
 * QMake composer. The special and AVX2 builds pass Qt's CPU feature list
 * and native tuning flags straight to qmake.
 */

import { Variant } from '../variant_matrix';
import { Composer, composeDialect } from './compose';
import { ComposeContext, Dialect, cmd, copiedTreeLocation, makeInstallLine, makeLine } from './steps';

function qmakeArgs(ctx: ComposeContext): string {
    const o = ctx.config.options;
    return cmd(o.use_clang ? '-spec linux-clang' : '', o.use_lto ? '-config ltcg' : '');
}

function qmakeLines(ctx: ComposeContext, variant: Variant): string[] {
    const s = ctx.config.settings;
    if (variant === 'Default64') {
        return [cmd('%qmake', qmakeArgs(ctx), s.extra_configure, s.extra_configure64)];
    }
    const extra = variant === 'Special' ? s.extra_configure_special : s.extra_configure;
    return [
        "%qmake 'QT_CPU_FEATURES.x86_64 += avx avx2 bmi bmi2 f16c fma lzcnt popcnt'\\",
        'QMAKE_CFLAGS+=-march=native QMAKE_CFLAGS+=-mtune=native QMAKE_CXXFLAGS+=-march=native QMAKE_CXXFLAGS+=-mtune=native \\',
        cmd('QMAKE_LFLAGS+=-march=native QMAKE_LFLAGS+=-mtune=native', qmakeArgs(ctx), extra),
    ];
}

const qmakeDialect: Dialect = {
    location: (ctx, variant) => copiedTreeLocation(ctx.config, variant),
    configure: (ctx, variant) => [...qmakeLines(ctx, variant), 'test -r config.log && cat config.log'],
    build: (ctx, variant, phase) => [makeLine(ctx, variant, phase)],
    install: (ctx, variant) => [makeInstallLine(ctx, variant)],
    clean: () => ['make clean || :'],
};

export const composeQmake: Composer = ctx => composeDialect(ctx, qmakeDialect);
