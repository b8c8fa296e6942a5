/**
 * Source Layout
 *
 * Maps every source URL to the directory its archive unpacks into. The seed
 * comes from the source-analysis collaborator; entries for the primary and
 * extra-version archives are recorded while %prep is synthesized and read by
 * every later phase. Looking up a URL with no entry is a precondition failure.
 */

import * as path from 'path';
import { ErrorFactory } from './structured_error';

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export interface ArchiveSource {
    /** Archive URL or file name. */
    url: string;
    /** Top-level directory inside the archive, '' when it has none. */
    prefix: string;
    /** Directory under the primary tree to copy the contents into. A leading ':' means "do not copy". */
    destination: string;
}

export interface VersionSource {
    url: string;
    version: string;
    /** Top-level directory inside the archive, '' when it has none. */
    prefix: string;
    /** N in %{SOURCEN}. */
    source_index: number;
}

export interface SourceSeed {
    url: string;
    /** Top-level directory of the primary archive, '' when it has none. */
    prefix: string;
    /** Directory the primary tree is known by once unpacked. */
    tarball_prefix: string;
    archives: ArchiveSource[];
    versions: VersionSource[];
    /** Go module proxy files packaged as extra sources (godep only). */
    godep: string[];
    /** Versions listed in the proxy `list` file (godep only). */
    godep_versions: string[];
    /** Directory `gem unpack` creates (ruby from gemspec only). */
    gem_subdir: string;
}

export interface LayoutEntry {
    prefix: string;
    /** True when the archive had no top-level directory and one was made up. */
    invented: boolean;
}

/* -------------------------------------------------------------------------- */
/* Helpers                                                                    */
/* -------------------------------------------------------------------------- */

/** Directory name made up for an archive with no top-level prefix: its base name minus the last extension. */
export function inventPrefix(url: string): string {
    const base = path.posix.basename(url);
    return path.posix.basename(base, path.posix.extname(base));
}

/** Package-metadata-only sources that %prep never extracts. */
export function isNonExtractable(url: string): boolean {
    return url.endsWith('.pom') || url.endsWith('.jar') || url.endsWith('.patch');
}

export function emptySeed(url: string): SourceSeed {
    return {
        url,
        prefix: '',
        tarball_prefix: '',
        archives: [],
        versions: [],
        godep: [],
        godep_versions: [],
        gem_subdir: '',
    };
}

/* -------------------------------------------------------------------------- */
/* Source Layout                                                              */
/* -------------------------------------------------------------------------- */

export class SourceLayout {
    private readonly entries = new Map<string, LayoutEntry>();

    constructor(public readonly seed: SourceSeed) { }

    /** Record where `url` was unpacked. Re-recording the same URL replaces the entry. */
    record(url: string, prefix: string, invented: boolean): void {
        this.entries.set(url, { prefix, invented });
    }

    has(url: string): boolean {
        return this.entries.has(url);
    }

    resolve(url: string): LayoutEntry {
        const entry = this.entries.get(url);
        if (!entry) throw ErrorFactory.missingSourceLayout(url);
        return entry;
    }

    /** Directory of the primary tree under %{_builddir}. */
    primaryDir(): string {
        return this.resolve(this.seed.url).prefix;
    }

    /** Directory of an extra version's tree. */
    versionDir(version: string): string {
        const source = this.seed.versions.find(v => v.version === version);
        if (!source) throw ErrorFactory.missingSourceLayout(`version ${version}`);
        return this.resolve(source.url).prefix;
    }
}
