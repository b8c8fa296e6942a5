import { BuildConfigurationInput, createBuildConfiguration } from '../src/build_config';
import { DirectiveStream } from '../src/directive_stream';
import { BuildSystemKind } from '../src/kinds';
import { SourceLayout, SourceSeed, emptySeed } from '../src/source_layout';
import { synthesize } from '../src/synthesizer';

export const DEMO_URL = 'https://example.org/releases/demo-1.0.tar.gz';

export function demoSeed(overrides: Partial<SourceSeed> = {}): SourceSeed {
    return { ...emptySeed(DEMO_URL), prefix: 'demo-1.0', tarball_prefix: 'demo-1.0', ...overrides };
}

export function demoInput(overrides: Partial<BuildConfigurationInput> = {}): BuildConfigurationInput {
    return { name: 'demo', version: '1.0', source_date_epoch: 1700000000, ...overrides };
}

/** Synthesizes with a fresh layout and returns the stream. */
export function compose(kind: BuildSystemKind, input: Partial<BuildConfigurationInput> = {}, seed: SourceSeed = demoSeed()): DirectiveStream {
    return synthesize(kind, createBuildConfiguration(demoInput(input)), new SourceLayout(seed));
}

/** Lines of `haystack` equal to `needle`. */
export function count(haystack: readonly string[], needle: string): number {
    return haystack.filter(l => l === needle).length;
}

/**
 * Walks pushd/popd pairs. Returns the depth at which each line ran, or
 * throws if a popd has no matching pushd.
 */
export function pushdDepths(lines: readonly string[]): number[] {
    let depth = 0;
    return lines.map(raw => {
        const line = raw.trim();
        if (line.startsWith('pushd ')) return ++depth;
        if (line === 'popd') {
            if (depth === 0) throw new Error('popd without pushd');
            return depth--;
        }
        return depth;
    });
}

export const PROXY_LINES = [
    'unset http_proxy',
    'unset https_proxy',
    'unset no_proxy',
    'export SSL_CERT_FILE=/var/cache/ca-certs/anchors/ca-certificates.crt',
];

export const AVX2_EXPORTS = [
    'unset PKG_CONFIG_PATH',
    'export CFLAGS="$CFLAGS -m64 -march=native -mtune=native"',
    'export CXXFLAGS="$CXXFLAGS -m64 -march=native -mtune=native"',
    'export FFLAGS="$FFLAGS -m64 -march=native -mtune=native"',
    'export FCFLAGS="$FCFLAGS -m64 -march=native -mtune=native"',
    'export LDFLAGS="$LDFLAGS -m64 -march=native -mtune=native"',
];
