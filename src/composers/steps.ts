/**
 * Step engine
 *
 * Shared emitters for %build and %install. A composer describes its build
 * system as a `Dialect` (where a variant's step runs and which commands it
 * runs); the engine walks the decision table and wraps each step in the
 * common envelope: snippet hooks, flag exports, PGO phasing, macro
 * overrides and push/pop into the step's directory.
 */

import { BuildConfiguration, MacroName, SnippetName } from '../build_config';
import { DecisionTable, BuildDecision, InstallDecision } from '../decision_table';
import { DirectiveStream } from '../directive_stream';
import {
    OPENMPI_ENTER,
    OPENMPI_LEAVE,
    avx2Exports,
    avx512Exports,
    openmpiExports,
    payloadBlock,
    payloadSnippet,
    pkgconfig32Links,
    proxyExports,
    snippetBlock,
    thirtyTwoBitExports,
    variableExports,
} from '../flags';
import { BuildSystemKind } from '../kinds';
import { EXTERNAL_MARKER_DIR, PgoPhase, PgoStep, markerPath, phaseFlagExports } from '../pgo';
import { SourceLayout } from '../source_layout';
import { Variant, isThirtyTwoBit, treePath } from '../variant_matrix';

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export interface ComposeContext {
    kind: BuildSystemKind;
    config: BuildConfiguration;
    layout: SourceLayout;
    table: DecisionTable;
}

export type Stage = 'build' | 'install';

/** Directives that enter a step's working directory and the matching ones that leave it. */
export interface Location {
    enter: string[];
    leave: string[];
}

/**
 * What a build system contributes to each step. `phase` is null for a step
 * without PGO.
 */
export interface Dialect {
    location(ctx: ComposeContext, variant: Variant, stage: Stage): Location;
    /** Source tree fix-ups run before configuring. */
    setup?(ctx: ComposeContext, variant: Variant): string[];
    /** Replaces the standard flag exports of a variant's build step; null keeps them. */
    profile?(ctx: ComposeContext, variant: Variant): string[] | null;
    configure?(ctx: ComposeContext, variant: Variant, phase: PgoPhase | null): string[];
    build(ctx: ComposeContext, variant: Variant, phase: PgoPhase | null): string[];
    install(ctx: ComposeContext, variant: Variant): string[];
    /** Removes build outputs between the profiling run and the optimized rebuild. */
    clean(ctx: ComposeContext): string[];
}

/* -------------------------------------------------------------------------- */
/* Small helpers                                                              */
/* -------------------------------------------------------------------------- */

/** Space-joins the non-empty parts of a command. */
export function cmd(...parts: string[]): string {
    return parts.filter(p => p.length > 0).join(' ');
}

/** `## <name> start` … `## <name> end` around an override's lines. */
export function macroBlock(config: BuildConfiguration, name: MacroName): string[] {
    return [`## ${name} start`, ...config.macros[name], `## ${name} end`];
}

export function parallelFlag(config: BuildConfiguration): string {
    return config.options.broken_parallel_build ? '' : '%{?_smp_mflags}';
}

const NO_LOCATION: Location = { enter: [], leave: [] };

/**
 * Location of an in-tree build: the primary tree (optionally its subdir) for
 * Default64, the variant's copied sibling tree otherwise.
 */
export function copiedTreeLocation(config: BuildConfiguration, variant: Variant): Location {
    const subdir = config.settings.subdir;
    const tree = treePath(variant, subdir);
    if (tree !== null) return { enter: [`pushd ${tree}`], leave: ['popd'] };
    if (subdir) return { enter: [`pushd ${subdir}`], leave: ['popd'] };
    return NO_LOCATION;
}

/** Location of a step that runs in the primary tree whatever the variant. */
export function primaryTreeLocation(config: BuildConfiguration): Location {
    const subdir = config.settings.subdir;
    return subdir ? { enter: [`pushd ${subdir}`], leave: ['popd'] } : NO_LOCATION;
}

/** Default make (or ninja) invocation for a variant's build step. */
export function makeLine(ctx: ComposeContext, variant: Variant, phase: PgoPhase | null): string {
    const s = ctx.config.settings;
    let extras: string[];
    if (isThirtyTwoBit(variant)) extras = [s.extra_make, s.extra32_make];
    else if (variant === 'Special') extras = [s.extra_make_special];
    else if (variant === 'Special2') extras = [s.extra_make_special2];
    else extras = [s.extra_make, s.extra64_make];

    const par = parallelFlag(ctx.config);
    if (ctx.config.options.use_ninja) return cmd('ninja --verbose', par, ...extras);
    const line = cmd('make', par, ...extras, 'V=1 VERBOSE=1');
    if (ctx.kind === 'make' && variant === 'Default64' && phase === null) {
        return `${line} CFLAGS="\${CFLAGS}" ASMFLAGS="\${ASMFLAGS}" CXXFLAGS="\${CXXFLAGS}" FFLAGS="\${FFLAGS}" FCFLAGS="\${FCFLAGS}" LDFLAGS="\${LDFLAGS}" LIBS+="\${LIBS}"`;
    }
    return line;
}

/** Default `%make_install*` invocation for a variant. */
export function makeInstallLine(ctx: ComposeContext, variant: Variant): string {
    const s = ctx.config.settings;
    const ninja = ctx.config.options.use_ninja;
    const tool = ninja ? '%ninja_install' : '%make_install';
    switch (variant) {
        case 'ThirtyTwoBit':
        case 'Special32':
            return cmd(`${tool}32`, s.extra_make32_install);
        case 'AVX512':
            return cmd(`${tool}_avx512`, s.extra_make_install);
        case 'AVX2':
            return cmd(`${tool}_avx2`, s.extra_make_install);
        case 'OpenMPI':
            return cmd(`${tool}_openmpi`, s.extra_make_install);
        case 'Special':
            return cmd(`${tool}_special`, s.extra_make_install_special);
        case 'Special2':
            return cmd(`${tool}_special2`, s.extra_make_install_special2);
        case 'Default64':
            return cmd(tool, s.extra_make_install);
    }
}

/* -------------------------------------------------------------------------- */
/* Section headers                                                            */
/* -------------------------------------------------------------------------- */

/** Opens %build with the environment every build shares. */
export function openBuild(out: DirectiveStream, config: BuildConfiguration): void {
    out.section('%build');
    out.verbatim(snippetBlock(config, 'build_prepend_once'));
    out.lines(proxyExports());
    out.line('export LANG=C.UTF-8');
    out.line(`export SOURCE_DATE_EPOCH=${config.source_date_epoch}`);
    if (config.options.asneeded) out.line('unset LD_AS_NEEDED');
}

/** Opens %install: fixed epoch, clean build root, license files. */
export function openInstall(out: DirectiveStream, config: BuildConfiguration): void {
    out.section('%install');
    out.line(`export SOURCE_DATE_EPOCH=${config.source_date_epoch}`);
    out.line('rm -rf %{buildroot}');
    out.lines(licenseLines(config));
}

export function licenseLines(config: BuildConfiguration): string[] {
    if (config.license_files.length === 0) return [];
    const dir = `%{buildroot}/usr/share/package-licenses/${config.name}`;
    return [
        `mkdir -p ${dir}`,
        ...config.license_files.map(f => `cp %{_builddir}/${f.path} ${dir}/${f.hash}`),
    ];
}

/** Trailer of %install: the append hook and the locale catalogue. */
export function closeInstall(out: DirectiveStream, config: BuildConfiguration): void {
    out.verbatim(snippetBlock(config, 'install_append'));
    out.lines(findLangLines(config));
}

export function findLangLines(config: BuildConfiguration): string[] {
    if (!config.options.findlang) return [];
    if (config.snippets.find_lang.length > 0) return snippetBlock(config, 'find_lang');
    if (config.locales.length === 0) return [];
    return [
        '## start %find_lang macros',
        ...config.locales.map(l => `%find_lang ${l}`),
        '## end %find_lang macros',
    ];
}

/** %check, only when there is a test command and tests are not skipped. */
export function writeCheck(out: DirectiveStream, config: BuildConfiguration): void {
    if (!config.tests || config.options.skip_tests) return;
    out.section('%check');
    out.line('export LANG=C.UTF-8');
    out.lines(proxyExports());
    out.line(config.tests);
}

/* -------------------------------------------------------------------------- */
/* Flag profiles per variant                                                  */
/* -------------------------------------------------------------------------- */

interface Profile {
    before: string[];
    after: string[];
}

function buildProfile(ctx: ComposeContext, variant: Variant): Profile {
    switch (variant) {
        case 'ThirtyTwoBit':
        case 'Special32':
            return { before: thirtyTwoBitExports(ctx.config), after: [] };
        case 'AVX512':
            return { before: avx512Exports(), after: [] };
        case 'AVX2':
            return { before: avx2Exports(), after: [] };
        case 'OpenMPI':
            return { before: [...OPENMPI_ENTER, ...openmpiExports()], after: OPENMPI_LEAVE };
        case 'Special':
        case 'Special2':
        case 'Default64':
            return { before: variableExports(ctx.config, ctx.kind, variant), after: [] };
    }
}

/** Flags an install step runs under: generate flags during an external GEN round, use flags after any profiling. */
export function installPgoFlags(ctx: ComposeContext, pgo: PgoStep): string[] {
    switch (pgo) {
        case 'NONE': return [];
        case 'GEN': return phaseFlagExports('GEN', ctx.kind);
        case 'TWO_PHASE':
        case 'USE':
            return phaseFlagExports('USE', ctx.kind);
    }
}

/* -------------------------------------------------------------------------- */
/* %build                                                                     */
/* -------------------------------------------------------------------------- */

function configureBlock(ctx: ComposeContext, dialect: Dialect, decision: BuildDecision, phase: PgoPhase | null): string[] {
    const override = phase === 'USE' ? decision.overrides.configure_use : decision.overrides.configure;
    if (override) return macroBlock(ctx.config, override);
    return dialect.configure ? dialect.configure(ctx, decision.variant, phase) : [];
}

function makeBlock(ctx: ComposeContext, dialect: Dialect, decision: BuildDecision, phase: PgoPhase | null): string[] {
    const config = ctx.config;
    const out: string[] = [...snippetBlock(config, 'trystatic')];
    if (isThirtyTwoBit(decision.variant)) {
        out.push(...snippetBlock(config, 'make_prepend32'));
    } else {
        out.push(...snippetBlock(config, 'make_prepend'), ...snippetBlock(config, 'make_prepend64'));
    }
    const override = phase === 'USE' ? decision.overrides.make_use : decision.overrides.make;
    out.push(...(override ? macroBlock(config, override) : dialect.build(ctx, decision.variant, phase)));
    out.push(...snippetBlock(config, 'make_append'));
    if (config.options.ccstats) out.push('## ccache stats', 'ccache -s || :', '## ccache stats');
    return out;
}

function cleanLines(ctx: ComposeContext, dialect: Dialect): string[] {
    const custom = ctx.config.settings.custom_clean_pgo;
    return custom ? [custom] : dialect.clean(ctx);
}

function pgoBody(ctx: ComposeContext, dialect: Dialect, decision: BuildDecision): string[] {
    const { config } = ctx;
    const variant = decision.variant;
    const setup = dialect.setup ? dialect.setup(ctx, variant) : [];
    const payload = payloadBlock(config, payloadSnippet(config, variant));

    switch (decision.pgo) {
        case 'NONE':
            return [...setup, ...configureBlock(ctx, dialect, decision, null), ...makeBlock(ctx, dialect, decision, null)];

        case 'TWO_PHASE': {
            const marker = markerPath(variant, 'IN_PROCESS');
            return [
                `if [ ! -f ${marker} ]; then`,
                'echo PGO Phase 1',
                ...phaseFlagExports('GEN', ctx.kind),
                ...setup,
                ...configureBlock(ctx, dialect, decision, 'GEN'),
                ...makeBlock(ctx, dialect, decision, 'GEN'),
                ...payload,
                ...cleanLines(ctx, dialect),
                `echo USED > ${marker}`,
                'fi',
                `if [ -f ${marker} ]; then`,
                'echo PGO Phase 2',
                ...phaseFlagExports('USE', ctx.kind),
                ...configureBlock(ctx, dialect, decision, 'USE'),
                ...makeBlock(ctx, dialect, decision, 'USE'),
                'fi',
            ];
        }

        case 'GEN': {
            const marker = markerPath(variant, 'EXTERNAL');
            // %prep hands every round a fresh tree, so only the profiling run is skipped
            return [
                'echo PGO Phase 1',
                ...phaseFlagExports('GEN', ctx.kind),
                ...setup,
                ...configureBlock(ctx, dialect, decision, 'GEN'),
                ...makeBlock(ctx, dialect, decision, 'GEN'),
                `if [ ! -f ${marker} ]; then`,
                ...payload,
                `mkdir -p ${EXTERNAL_MARKER_DIR}`,
                `echo USED > ${marker}`,
                'fi',
            ];
        }

        case 'USE': {
            const marker = markerPath(variant, 'EXTERNAL');
            return [
                'echo PGO Phase 2',
                `test -f ${marker} || { echo "PGO phase 2 without phase 1 marker ${marker}"; exit 1; }`,
                ...phaseFlagExports('USE', ctx.kind),
                ...setup,
                ...configureBlock(ctx, dialect, decision, 'USE'),
                ...makeBlock(ctx, dialect, decision, 'USE'),
            ];
        }
    }
}

/** One variant's %build block. */
export function buildStep(ctx: ComposeContext, dialect: Dialect, decision: BuildDecision): string[] {
    const { config } = ctx;
    const variant = decision.variant;
    const where = dialect.location(ctx, variant, 'build');
    const custom = dialect.profile ? dialect.profile(ctx, variant) : null;
    const profile = custom === null ? buildProfile(ctx, variant) : { before: custom, after: [] };
    return [
        ...where.enter,
        ...snippetBlock(config, 'build_prepend'),
        ...(isThirtyTwoBit(variant) ? snippetBlock(config, 'build_prepend32') : []),
        ...profile.before,
        ...pgoBody(ctx, dialect, decision),
        ...snippetBlock(config, 'build_append'),
        ...profile.after,
        ...where.leave,
    ];
}

/** Every %build block in build order, blank-separated. */
export function writeBuildSteps(out: DirectiveStream, ctx: ComposeContext, dialect: Dialect): void {
    for (const decision of ctx.table.build) {
        out.blank();
        out.lines(buildStep(ctx, dialect, decision));
    }
}

/* -------------------------------------------------------------------------- */
/* %install                                                                   */
/* -------------------------------------------------------------------------- */

const INSTALL_PREPEND: Record<Variant, SnippetName> = {
    ThirtyTwoBit: 'install_prepend_32',
    Special32: 'install_prepend_32',
    AVX512: 'install_prepend',
    AVX2: 'install_prepend',
    OpenMPI: 'install_prepend',
    Special: 'install_prepend_special',
    Special2: 'install_prepend_special2',
    Default64: 'install_prepend',
};

/** One variant's install block. */
export function installStep(ctx: ComposeContext, dialect: Dialect, decision: InstallDecision): string[] {
    const { config } = ctx;
    const variant = decision.variant;
    const where = dialect.location(ctx, variant, 'install');
    const body = decision.override ? macroBlock(config, decision.override) : dialect.install(ctx, variant);

    switch (variant) {
        case 'ThirtyTwoBit':
        case 'Special32':
            return [
                ...thirtyTwoBitExports(config),
                ...snippetBlock(config, INSTALL_PREPEND[variant]),
                ...where.enter,
                ...body,
                ...pkgconfig32Links(),
                ...where.leave,
            ];
        case 'AVX512':
        case 'AVX2':
            return [...where.enter, ...body, ...where.leave];
        case 'OpenMPI':
            return [...where.enter, ...OPENMPI_ENTER, ...body, ...OPENMPI_LEAVE, ...where.leave];
        case 'Special':
        case 'Special2':
        case 'Default64':
            return [
                ...variableExports(config, ctx.kind, variant),
                ...installPgoFlags(ctx, decision.pgo),
                ...snippetBlock(config, INSTALL_PREPEND[variant]),
                ...where.enter,
                ...body,
                ...where.leave,
            ];
    }
}

/** The whole %install section for a dialect-driven kind. */
export function writeInstall(out: DirectiveStream, ctx: ComposeContext, dialect: Dialect): void {
    openInstall(out, ctx.config);
    for (const decision of ctx.table.install) {
        out.lines(installStep(ctx, dialect, decision));
    }
    closeInstall(out, ctx.config);
}
