/**
 * Cargo composer
 *
 * `cargo install` does the compiling, so the interesting work sits in
 * %install. In-process PGO uses two markers in the source tree: `statuspgo`
 * once the instrumented install has been profiled, `statuspgo2` once the
 * merged profile has been used. An optional BOLT pass adds `statusbolt`.
 */

import { MacroName } from '../build_config';
import { DirectiveStream } from '../directive_stream';
import { payloadBlock, proxyExports, snippetBlock, variableExports } from '../flags';
import { CARGO_BOLT_MARKER, CARGO_USE_MARKER, EXTERNAL_MARKER_DIR, PgoPhase, markerPath, phaseFlagExports } from '../pgo';
import { Composer } from './compose';
import { writePrep } from './prep';
import {
    ComposeContext,
    cmd,
    closeInstall,
    macroBlock,
    openBuild,
    openInstall,
    primaryTreeLocation,
    writeCheck,
} from './steps';

const CARGO_INSTALL = 'cargo install -Zunstable-options -Zhost-config -Ztarget-applies-to-host --jobs 20 -vv --offline --locked --no-track --force --profile release --target x86_64-unknown-linux-gnu --path . --root %{buildroot}/usr/';

const MERGE_PROFILES = `llvm-profdata merge -o ${EXTERNAL_MARKER_DIR}/rustmerged.profdata ${EXTERNAL_MARKER_DIR}/*.profraw`;

export function cargoInstallLine(ctx: ComposeContext, phase: PgoPhase | null): string {
    const s = ctx.config.settings;
    if (phase === 'USE' && (s.extra_configure_pgo || s.extra_configure64_pgo)) {
        return cmd(CARGO_INSTALL, s.extra_configure_pgo, s.extra_configure64_pgo);
    }
    return cmd(CARGO_INSTALL, s.extra_configure, s.extra_configure64);
}

function overrideOr(ctx: ComposeContext, name: MacroName | undefined, fallback: string[]): string[] {
    return name ? macroBlock(ctx.config, name) : fallback;
}

function cleanLines(ctx: ComposeContext): string[] {
    const custom = ctx.config.settings.custom_clean_pgo;
    return [custom || 'cargo clean || :'];
}

/* -------------------------------------------------------------------------- */
/* %install bodies                                                            */
/* -------------------------------------------------------------------------- */

function installBody(ctx: ComposeContext): string[] {
    const { config, table } = ctx;
    const build = table.build.find(d => d.variant === 'Default64');
    const install = table.install.find(d => d.variant === 'Default64');
    if (!build || !install) return [];

    const where = primaryTreeLocation(config);
    const payload = payloadBlock(config, 'profile_payload');
    const genCommand = overrideOr(ctx, build.overrides.make, ['cargo clean || :', cargoInstallLine(ctx, 'GEN')]);
    const useCommand = overrideOr(ctx, build.overrides.make_use, [cargoInstallLine(ctx, 'USE')]);
    const installOverride = install.override ? macroBlock(config, install.override) : [];

    switch (install.pgo) {
        case 'NONE':
            return [...where.enter, ...(install.override ? installOverride : [cargoInstallLine(ctx, null)]), ...where.leave];

        case 'TWO_PHASE': {
            const marker = markerPath('Default64', 'IN_PROCESS');
            const lines = [
                ...where.enter,
                ...installOverride,
                ...where.leave,
                `if [ ! -f ${marker} ]; then`,
                'echo PGO Phase 1',
                ...where.enter,
                ...phaseFlagExports('GEN', 'cargo'),
                ...genCommand,
                ...payload,
                ...cleanLines(ctx),
                ...where.leave,
                `echo USED > ${marker}`,
                'fi',
                `if [ -f ${marker} ] && [ ! -f ${CARGO_USE_MARKER} ]; then`,
                'echo PGO Phase 2',
                ...where.enter,
                MERGE_PROFILES,
                ...phaseFlagExports('USE', 'cargo'),
                ...useCommand,
                ...where.leave,
                `echo USED > ${CARGO_USE_MARKER}`,
                'fi',
            ];
            if (config.options.altcargo_sample_bolt) {
                lines.push(
                    `if [ ! -f ${CARGO_BOLT_MARKER} ]; then`,
                    'echo BOLT Phase',
                    ...where.enter,
                    ...payloadBlock(config, 'profile_payload_bolt'),
                    ...where.leave,
                    `echo USED > ${CARGO_BOLT_MARKER}`,
                    'fi',
                );
            }
            return lines;
        }

        case 'GEN': {
            const marker = markerPath('Default64', 'EXTERNAL');
            return [
                'echo PGO Phase 1',
                ...where.enter,
                ...installOverride,
                ...phaseFlagExports('GEN', 'cargo'),
                ...genCommand,
                `if [ ! -f ${marker} ]; then`,
                ...payload,
                `mkdir -p ${EXTERNAL_MARKER_DIR}`,
                `echo USED > ${marker}`,
                'fi',
                ...where.leave,
            ];
        }

        case 'USE': {
            const marker = markerPath('Default64', 'EXTERNAL');
            return [
                'echo PGO Phase 2',
                `test -f ${marker} || { echo "PGO phase 2 without phase 1 marker ${marker}"; exit 1; }`,
                ...where.enter,
                ...installOverride,
                ...phaseFlagExports('USE', 'cargo'),
                ...useCommand,
                ...where.leave,
            ];
        }
    }
}

/* -------------------------------------------------------------------------- */
/* Composer                                                                   */
/* -------------------------------------------------------------------------- */

export const composeCargo: Composer = ctx => {
    const { config } = ctx;
    const out = new DirectiveStream();
    const primary = ctx.table.build.find(d => d.variant === 'Default64');

    writePrep(out, ctx);

    openBuild(out, config);
    out.verbatim(snippetBlock(config, 'build_prepend'));
    out.lines(variableExports(config, 'cargo', 'Default64'));
    if (primary && primary.pgo === 'NONE' && primary.overrides.make) {
        const where = primaryTreeLocation(config);
        out.lines([...where.enter, ...macroBlock(config, primary.overrides.make), ...where.leave]);
    }
    out.verbatim(snippetBlock(config, 'build_append'));

    writeCheck(out, config);

    openInstall(out, config);
    out.lines(proxyExports());
    out.line('export LANG=C.UTF-8');
    out.lines(variableExports(config, 'cargo', 'Default64'));
    out.verbatim(snippetBlock(config, 'install_prepend'));
    out.lines(installBody(ctx));
    closeInstall(out, config);
    return out;
};
