/**
 * PGO State Machine
 *
 * Decides whether a build step is split into generate/use sub-steps and how
 * the split is carried out:
 *
 *   IN_PROCESS  one synthesis pass; a shell conditional on a marker file in
 *               the build tree runs GEN, profiles, cleans, writes the marker,
 *               then runs USE, all inside one sandbox build.
 *   EXTERNAL    one phase per synthesis pass, selected by
 *               `altflags_pgo_ext_phase` (false = GEN, true = USE). GEN is
 *               guarded by a marker under EXTERNAL_MARKER_DIR so a repeated
 *               GEN round skips the profiling run; USE refuses to run when
 *               that marker is missing.
 *
 * Resolution checks IN_PROCESS first, so a configuration carrying both a
 * profile payload with `altflags_pgo` and `altflags_pgo_ext` is in-process.
 * `altflags_pgo` without a payload leaves nothing to run in-process and
 * also rules out the external split. `fsalt1` disables PGO outright.
 */

import { BuildConfiguration, hasSnippet } from './build_config';
import { BuildSystemKind, KIND_TRAITS } from './kinds';
import { ErrorFactory } from './structured_error';
import { Variant } from './variant_matrix';

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type PgoMode = 'NONE' | 'IN_PROCESS' | 'EXTERNAL';

export type PgoPhase = 'GEN' | 'USE';

/** What one %build step does about PGO. */
export type PgoStep = 'NONE' | 'TWO_PHASE' | 'GEN' | 'USE';

/** Directory holding the markers of externally phased builds; it outlives %prep re-extraction. */
export const EXTERNAL_MARKER_DIR = '/var/tmp/pgo';

const MARKERS: Partial<Record<Variant, string>> = {
    Default64: 'statuspgo',
    Special: 'statuspgo.special',
    Special2: 'statuspgo.special2',
};

/** Second marker of the in-process cargo flow (profile merged, optimized install done). */
export const CARGO_USE_MARKER = 'statuspgo2';

/** Marker of the optional cargo BOLT pass. */
export const CARGO_BOLT_MARKER = 'statusbolt';

/* -------------------------------------------------------------------------- */
/* Resolution                                                                 */
/* -------------------------------------------------------------------------- */

export function resolvePgoMode(config: BuildConfiguration, kind: BuildSystemKind): PgoMode {
    const o = config.options;
    if (!KIND_TRAITS[kind].pgo || o.fsalt1) return 'NONE';
    if (hasSnippet(config, 'profile_payload') && o.altflags_pgo) return 'IN_PROCESS';
    if (kind === 'cargo' && o.altcargo_pgo && !o.altflags_pgo_ext) return 'IN_PROCESS';
    if (o.altflags_pgo_ext && !o.altflags_pgo) return 'EXTERNAL';
    return 'NONE';
}

export function externalPhase(config: BuildConfiguration): PgoPhase {
    return config.options.altflags_pgo_ext_phase ? 'USE' : 'GEN';
}

export function pgoAppliesTo(variant: Variant): boolean {
    return MARKERS[variant] !== undefined;
}

/** PGO step for one variant's %build block. */
export function pgoStepFor(mode: PgoMode, config: BuildConfiguration, variant: Variant): PgoStep {
    if (mode === 'NONE' || !pgoAppliesTo(variant)) return 'NONE';
    if (mode === 'IN_PROCESS') return 'TWO_PHASE';
    return externalPhase(config);
}

/**
 * Reject settings that cannot be tie-broken: cargo-only PGO on another kind,
 * or a profile payload selected for in-process PGO with nothing to run.
 */
export function assertPgoConsistent(config: BuildConfiguration, kind: BuildSystemKind): void {
    const o = config.options;
    if (o.fsalt1) return;
    if ((o.altcargo_pgo || o.altcargo_sample_bolt) && kind !== 'cargo') {
        throw ErrorFactory.pgoInconsistent('altcargo_pgo and altcargo_sample_bolt apply to cargo builds only', { kind });
    }
    if (o.altcargo_sample_bolt && !o.altcargo_pgo) {
        throw ErrorFactory.pgoInconsistent('altcargo_sample_bolt needs altcargo_pgo', { kind });
    }
    if (kind === 'cargo' && o.altcargo_pgo && !o.altflags_pgo_ext && !hasSnippet(config, 'profile_payload')) {
        throw ErrorFactory.pgoInconsistent('altcargo_pgo needs a profile_payload to train on', { kind });
    }
}

/* -------------------------------------------------------------------------- */
/* Markers                                                                    */
/* -------------------------------------------------------------------------- */

/** Marker file for a variant's PGO state: relative to the build tree in-process, absolute when external. */
export function markerPath(variant: Variant, mode: PgoMode): string {
    const name = MARKERS[variant] ?? 'statuspgo';
    return mode === 'EXTERNAL' ? `${EXTERNAL_MARKER_DIR}/${name}` : name;
}

/* -------------------------------------------------------------------------- */
/* Flag switches                                                              */
/* -------------------------------------------------------------------------- */

const C_FLAG_VARS = ['CFLAGS', 'CXXFLAGS', 'FFLAGS', 'FCFLAGS', 'LDFLAGS', 'ASMFLAGS', 'LIBS'];

const CARGO_FLAG_VARS = [
    'CFLAGS',
    'CXXFLAGS',
    'LDFLAGS',
    'CFLAGS_x86_64_unknown_linux_gnu',
    'CXXFLAGS_x86_64_unknown_linux_gnu',
    'LDFLAGS_x86_64_unknown_linux_gnu',
    'CARGO_TARGET_X86_64_UNKNOWN_LINUX_GNU_RUSTFLAGS',
    'RUSTFLAGS',
    'CARGO_HOST_RUSTFLAGS',
];

/** Exports switching the toolchain flags to the profile-generate or profile-use set. */
export function phaseFlagExports(phase: PgoPhase, kind: BuildSystemKind): string[] {
    const suffix = phase === 'GEN' ? 'GENERATE' : 'USE';
    const vars = kind === 'cargo' ? CARGO_FLAG_VARS : C_FLAG_VARS;
    return vars.map(v => `export ${v}="\${${v}_${suffix}}"`);
}
