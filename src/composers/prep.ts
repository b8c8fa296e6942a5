/**
 * %prep composer
 *
 * Unpacks the primary source and its auxiliary archives, records where each
 * one landed in the SourceLayout, applies patches and snapshots the primary
 * tree for every variant that builds in a copy of it.
 */

import * as path from 'path';
import { BuildConfiguration } from '../build_config';
import { DirectiveStream } from '../directive_stream';
import { CA_BUNDLE, snippetBlock } from '../flags';
import { createLogger } from '../logger';
import { SourceLayout, inventPrefix, isNonExtractable } from '../source_layout';
import { Variant, treeDir } from '../variant_matrix';
import { ComposeContext } from './steps';

const log = createLogger('prep');

/** How the primary source is unpacked. */
export type SetupMode = 'tarball' | 'combined' | 'gem' | 'none';

export interface PrepOptions {
    setup?: SetupMode;
    /** Variants whose build runs in a copy of the primary tree. Defaults to every non-primary variant. */
    copied?: (variant: Variant) => boolean;
}

/* -------------------------------------------------------------------------- */
/* Primary source                                                             */
/* -------------------------------------------------------------------------- */

function primarySetup(out: DirectiveStream, config: BuildConfiguration, layout: SourceLayout, mode: SetupMode): void {
    const seed = layout.seed;

    if (mode === 'gem') {
        layout.record(seed.url, seed.gem_subdir, false);
        out.line('gem unpack %{SOURCE0}');
        out.line(`%setup -q -D -T -n ${seed.gem_subdir}`);
        out.line(`gem spec %{SOURCE0} -l --ruby > ${config.name}.gemspec`);
        return;
    }

    if (mode === 'combined') {
        out.line(`%setup -q -c -n ${seed.tarball_prefix}`);
        layout.record(seed.url, seed.tarball_prefix, false);
    } else if (seed.prefix) {
        const base = path.posix.basename(seed.prefix);
        if (base && base !== seed.prefix) {
            out.line(`%setup -c -n ${base}`);
            out.line(`find ${seed.prefix} -mindepth 1 -name '*' -exec mv -n {} ./ \\; || :`);
            layout.record(seed.url, base, false);
        } else {
            out.line(`%setup -q -n ${seed.prefix}`);
            layout.record(seed.url, seed.prefix, false);
        }
    } else {
        const invented = inventPrefix(seed.url);
        out.line(`%setup -q -c -n ${invented}`);
        layout.record(seed.url, invented, true);
    }

    for (const archive of seed.archives) {
        if (isNonExtractable(archive.url)) continue;
        const file = `%{_sourcedir}/${path.posix.basename(archive.url)}`;
        const extract = archive.url.endsWith('.zip') ? `unzip -q ${file}` : `tar xf ${file}`;
        out.line('cd %{_builddir}');
        if (archive.prefix) {
            out.line(extract);
        } else {
            const fake = inventPrefix(archive.url);
            out.line(`mkdir -p ${fake}`);
            out.line(`cd ${fake}`);
            out.line(extract);
        }
    }

    out.line(`cd %{_builddir}/${layout.primaryDir()}`);

    for (const version of seed.versions) {
        out.line('cd ..');
        if (version.prefix) {
            out.line(`%setup -q -T -n ${version.prefix} -b ${version.source_index}`);
            layout.record(version.url, version.prefix, false);
        } else {
            const invented = inventPrefix(version.url);
            out.line(`%setup -q -T -c -n ${invented} -b ${version.source_index}`);
            layout.record(version.url, invented, true);
        }
    }
}

/* -------------------------------------------------------------------------- */
/* Auxiliary archives                                                         */
/* -------------------------------------------------------------------------- */

function archiveDestinations(out: DirectiveStream, layout: SourceLayout): void {
    const seed = layout.seed;
    for (const archive of seed.archives) {
        if (!archive.destination || archive.destination.startsWith(':')) continue;
        if (archive.prefix === seed.tarball_prefix) {
            log.warn(`Archive ${archive.url} already unpacked in ${seed.tarball_prefix}; ignoring destination`);
            continue;
        }
        const from = archive.prefix || inventPrefix(archive.url);
        out.line(`mkdir -p ${archive.destination}`);
        out.line(`cp -a %{_builddir}/${from}/* %{_builddir}/${seed.tarball_prefix}/${archive.destination}`);
    }
}

function cargoVendor(out: DirectiveStream, config: BuildConfiguration): void {
    if (!config.options.altcargo1 && !config.options.altcargo_pgo) return;
    out.line('export CARGO_NET_GIT_FETCH_WITH_CLI=true');
    out.line(`export SSL_CERT_FILE=${CA_BUNDLE}`);
    out.line(`export CARGO_HTTP_CAINFO=${CA_BUNDLE}`);
    out.line('cargo update --verbose');
    out.verbatim(snippetBlock(config, 'cargo_update'));
    out.line('cargo fetch --verbose');
}

/* -------------------------------------------------------------------------- */
/* Patches                                                                    */
/* -------------------------------------------------------------------------- */

/** `%patchN <opts>` for one entry; entries are `file [options]`, options default to -p1. */
function patchLine(entry: string, index: number): string | null {
    const trimmed = entry.trim();
    const space = trimmed.search(/\s/);
    const file = space === -1 ? trimmed : trimmed.slice(0, space);
    const opts = space === -1 ? '-p1' : trimmed.slice(space + 1).trim();
    if (file.endsWith('.nopatch')) return null;
    return `%patch${index} ${opts}`;
}

export function patchLines(config: BuildConfiguration, layout: SourceLayout): string[] {
    const out: string[] = [];
    let counter = 1;
    for (const entry of config.patches) {
        const line = patchLine(entry, counter++);
        if (line) out.push(line);
    }
    for (const [version, entries] of Object.entries(config.version_patches)) {
        if (entries.length === 0) continue;
        out.push(`cd ../${layout.versionDir(version)}`);
        for (const entry of entries) {
            const line = patchLine(entry, counter++);
            if (line) out.push(line);
        }
    }
    return out;
}

/* -------------------------------------------------------------------------- */
/* %prep                                                                      */
/* -------------------------------------------------------------------------- */

export function writePrep(out: DirectiveStream, ctx: ComposeContext, options: PrepOptions = {}): void {
    const { config, layout } = ctx;
    const mode = options.setup ?? 'tarball';
    const copied = options.copied ?? ((v: Variant) => v !== 'Default64');

    out.section('%prep');
    out.verbatim(snippetBlock(config, 'prep_prepend'));
    if (mode !== 'none') primarySetup(out, config, layout, mode);
    archiveDestinations(out, layout);
    cargoVendor(out, config);
    out.lines(patchLines(config, layout));

    if (mode === 'none') return;
    const primary = layout.primaryDir();
    for (const variant of ctx.table.variants) {
        const dir = treeDir(variant);
        if (dir === null || !copied(variant)) continue;
        out.line('pushd %{_builddir}');
        out.line(`cp -a %{_builddir}/${primary} ${dir}`);
        out.line('popd');
    }
}
