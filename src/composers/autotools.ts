/**
 * Autotools family: plain make, configure, reconfigure, autogen, the two
 * build.tcl flavours and phpize. They share the make line, the
 * `%make_install*` macros and the copied-tree layout; they differ in the
 * configure verb and its arguments.
 */

import { LIB32_SUFFIX } from '../flags';
import { PgoPhase } from '../pgo';
import { Variant, isThirtyTwoBit } from '../variant_matrix';
import { Composer, composeDialect } from './compose';
import { ComposeContext, Dialect, cmd, copiedTreeLocation, makeInstallLine, makeLine } from './steps';

function disableStatic(ctx: ComposeContext): string {
    return ctx.config.options.keepstatic ? '' : '--disable-static';
}

/** Arguments of a `%configure`-style invocation for one variant and phase. */
export function configureArgs(ctx: ComposeContext, variant: Variant, phase: PgoPhase | null): string[] {
    const s = ctx.config.settings;
    const ds = disableStatic(ctx);
    switch (variant) {
        case 'ThirtyTwoBit':
        case 'Special32':
            return [ds, s.extra_configure, s.extra_configure32, LIB32_SUFFIX];
        case 'AVX512':
            return [ds, s.extra_configure, s.extra_configure64, s.extra_configure_avx512];
        case 'AVX2':
            return [ds, s.extra_configure, s.extra_configure64, s.extra_configure_avx2];
        case 'OpenMPI':
            return [s.conf_args_openmpi, s.extra_configure_openmpi];
        case 'Special':
            return [ds, s.extra_configure_special];
        case 'Special2':
            return [ds, s.extra_configure_special2];
        case 'Default64':
            if (phase === 'USE' && (s.extra_configure_pgo || s.extra_configure64_pgo)) {
                return [ds, s.extra_configure_pgo, s.extra_configure64_pgo];
            }
            return [ds, s.extra_configure, s.extra_configure64];
    }
}

const MAKE_CLEAN = ['make clean || :'];

function autotoolsDialect(verb: string, setup?: (ctx: ComposeContext) => string[]): Dialect {
    return {
        location: (ctx, variant) => copiedTreeLocation(ctx.config, variant),
        setup,
        configure: (ctx, variant, phase) => {
            const args = configureArgs(ctx, variant, phase);
            if (variant === 'OpenMPI') return [cmd('./configure', ...args)];
            return [cmd(verb, ...args)];
        },
        build: (ctx, variant, phase) => [makeLine(ctx, variant, phase)],
        install: (ctx, variant) => [makeInstallLine(ctx, variant)],
        clean: () => MAKE_CLEAN,
    };
}

/* -------------------------------------------------------------------------- */
/* Dialects                                                                   */
/* -------------------------------------------------------------------------- */

const makeDialect: Dialect = {
    location: (ctx, variant) => copiedTreeLocation(ctx.config, variant),
    build: (ctx, variant, phase) => [makeLine(ctx, variant, phase)],
    install: (ctx, variant) => [makeInstallLine(ctx, variant)],
    clean: () => MAKE_CLEAN,
};

function autogenSetup(ctx: ComposeContext): string[] {
    const lines = [
        "sd -r '\\s--dirty\\s' ' ' .",
        "sd -r 'git describe' 'git describe --abbrev=0' .",
    ];
    if (ctx.config.options.disable_maintainer) {
        lines.push("sd --flags mi '^AC_INIT\\((.*\\n.*\\)|.*\\))' '$0\\nAM_MAINTAINER_MODE([disable])' configure.ac");
    }
    return lines;
}

const configureDialect = autotoolsDialect('%configure');
const reconfigureDialect = autotoolsDialect('%reconfigure');

function autogenDialect(ctx: ComposeContext): Dialect {
    return autotoolsDialect(ctx.config.options.autogen_simple ? '%autogen_simple' : '%autogen', autogenSetup);
}

function tclArgs(ctx: ComposeContext, variant: Variant): string[] {
    const s = ctx.config.settings;
    if (isThirtyTwoBit(variant)) return [s.extra_configure, s.extra_configure32];
    if (variant === 'Special') return [s.extra_configure_special];
    if (variant === 'Special2') return [s.extra_configure_special2];
    return [s.extra_configure, s.extra_configure64];
}

function tclInstallExtra(ctx: ComposeContext, variant: Variant): string {
    const s = ctx.config.settings;
    if (isThirtyTwoBit(variant)) return s.extra_make32_install;
    if (variant === 'Special') return s.extra_make_install_special;
    if (variant === 'Special2') return s.extra_make_install_special2;
    return s.extra_make_install;
}

function buildtclDialect(configureVerb: string, installVerb: string): Dialect {
    return {
        location: (ctx, variant) => copiedTreeLocation(ctx.config, variant),
        configure: (ctx, variant) => [cmd(configureVerb, ...tclArgs(ctx, variant))],
        build: (ctx, variant, phase) => [makeLine(ctx, variant, phase)],
        install: (ctx, variant) => [cmd(installVerb, tclInstallExtra(ctx, variant))],
        clean: () => MAKE_CLEAN,
    };
}

const phpizeDialect: Dialect = {
    location: (ctx, variant) => copiedTreeLocation(ctx.config, variant),
    setup: () => ['phpize'],
    configure: ctx => [cmd('%configure', disableStatic(ctx), ctx.config.settings.extra_configure)],
    build: (ctx, variant, phase) => [makeLine(ctx, variant, phase)],
    install: () => ['%make_install'],
    clean: () => MAKE_CLEAN,
};

/* -------------------------------------------------------------------------- */
/* Composers                                                                  */
/* -------------------------------------------------------------------------- */

export const composeMake: Composer = ctx => composeDialect(ctx, makeDialect);
export const composeConfigure: Composer = ctx => composeDialect(ctx, configureDialect);
export const composeConfigureAc: Composer = ctx => composeDialect(ctx, reconfigureDialect);
export const composeAutogen: Composer = ctx => composeDialect(ctx, autogenDialect(ctx));
export const composeBuildtclScript: Composer = ctx =>
    composeDialect(ctx, buildtclDialect('tclsh build.tcl', '%buildtcl_script_install'));
export const composeBuildtclConfigure: Composer = ctx =>
    composeDialect(ctx, buildtclDialect('%configure_buildtcl', '%buildtcl_configure_install'));
export const composePhpize: Composer = ctx => composeDialect(ctx, phpizeDialect);
