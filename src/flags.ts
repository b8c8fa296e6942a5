/**
 * Flag profiles
 *
 * Environment exports emitted around build and install steps: the proxy
 * lockout, per-variant architecture flags, the 32-bit toolchain reset, the
 * alternative-flag snippets chosen by the PGO options, and the profiling
 * payload wrapper.
 */

import { BuildConfiguration, SnippetName, hasSnippet } from './build_config';
import { BuildSystemKind } from './kinds';
import { Variant } from './variant_matrix';

export const CA_BUNDLE = '/var/cache/ca-certs/anchors/ca-certificates.crt';

export function proxyExports(): string[] {
    return [
        'unset http_proxy',
        'unset https_proxy',
        'unset no_proxy',
        `export SSL_CERT_FILE=${CA_BUNDLE}`,
    ];
}

/* -------------------------------------------------------------------------- */
/* Snippet blocks                                                             */
/* -------------------------------------------------------------------------- */

/** `## <name> content` … `## <name> end` around a snippet, or nothing when it is empty. */
export function snippetBlock(config: BuildConfiguration, name: SnippetName): string[] {
    if (!hasSnippet(config, name)) return [];
    return [`## ${name} content`, ...config.snippets[name], `## ${name} end`];
}

/* -------------------------------------------------------------------------- */
/* Architecture profiles                                                      */
/* -------------------------------------------------------------------------- */

function appendFlags(vars: readonly string[], flags: string): string[] {
    return vars.map(v => `export ${v}="$${v} ${flags}"`);
}

const NATIVE = '-m64 -march=native -mtune=native';

export function avx2Exports(): string[] {
    return ['unset PKG_CONFIG_PATH', ...appendFlags(['CFLAGS', 'CXXFLAGS', 'FFLAGS', 'FCFLAGS', 'LDFLAGS'], NATIVE)];
}

export function avx512Exports(): string[] {
    return [
        'unset PKG_CONFIG_PATH',
        ...appendFlags(['CFLAGS', 'CXXFLAGS', 'FFLAGS', 'FCFLAGS'], '-m64 -march=skylake-avx512 -mprefer-vector-width=256'),
        ...appendFlags(['LDFLAGS'], '-m64 -march=skylake-avx512'),
    ];
}

export const OPENMPI_ENTER = ['. /usr/share/defaults/etc/profile.d/modules.sh', 'module load openmpi'];
export const OPENMPI_LEAVE = ['module unload openmpi'];

export function openmpiExports(): string[] {
    return appendFlags(['CFLAGS', 'CXXFLAGS', 'FCFLAGS', 'FFLAGS', 'LDFLAGS'], NATIVE);
}

/** x86-64-v3 flags of the python AVX2 build that installs into %{buildroot}-v3. */
export function pythonV3Exports(): string[] {
    return [
        ...appendFlags(['CFLAGS', 'CXXFLAGS', 'FFLAGS'], '-m64 -march=x86-64-v3 -Wl,-z,x86-64-v3'),
        ...appendFlags(['FCFLAGS', 'LDFLAGS'], '-m64 -march=x86-64-v3'),
    ];
}

/* -------------------------------------------------------------------------- */
/* 32-bit toolchain                                                           */
/* -------------------------------------------------------------------------- */

const RESET_32 = [
    'unset LD_LIBRARY_PATH',
    'unset LIBRARY_PATH',
    'unset CPATH',
    'unset ASFLAGS',
    'unset CFLAGS',
    'unset CXXFLAGS',
    'unset FCFLAGS',
    'unset FFLAGS',
    'unset LDFLAGS',
    'unset LINKFLAGS',
];

const PKG_CONFIG_32 = 'export PKG_CONFIG_PATH="/usr/lib32/pkgconfig:/usr/share/pkgconfig"';

export function thirtyTwoBitExports(config: BuildConfiguration): string[] {
    const o = config.options;
    if (o.fsalt1_32 && !o.altflags_pgo_32) {
        if (!hasSnippet(config, 'altflags1_32')) return [];
        return [
            '## altflags1_32 content',
            ...RESET_32,
            PKG_CONFIG_32,
            ...config.snippets.altflags1_32,
            '## altflags1_32 end',
        ];
    }

    const base = o.use_clang ? '-O2' : '-O2 -ffat-lto-objects -fuse-linker-plugin';
    const tail = '-pipe -march=native -mtune=native -m32 -mstackrealign';
    const plain = `${base} ${tail}`;
    const cxx = `${base} -fvisibility-inlines-hidden ${tail}`;
    const toolchain = o.use_clang
        ? ['export CC=clang', 'export CXX=clang++']
        : ['export AR=gcc-ar', 'export RANLIB=gcc-ranlib', 'export NM=gcc-nm'];

    return [
        ...toolchain,
        ...RESET_32,
        PKG_CONFIG_32,
        'export ASFLAGS="--32"',
        `export CFLAGS="${plain}"`,
        `export ASMFLAGS="${plain}"`,
        `export CXXFLAGS="${cxx}"`,
        `export FCFLAGS="${cxx}"`,
        `export FFLAGS="${cxx}"`,
        `export LDFLAGS="${plain}"`,
    ];
}

export const LIB32_SUFFIX = '--libdir=/usr/lib32 --build=i686-generic-linux-gnu --host=i686-generic-linux-gnu --target=i686-clr-linux-gnu';

/** Links every installed .pc file under a `32` prefix so 32-bit consumers find them. */
export function pkgconfig32Links(): string[] {
    const loop = (dir: string): string[] => [
        `if [ -d %{buildroot}${dir} ]`,
        'then',
        `    pushd %{buildroot}${dir}`,
        '    for i in *.pc ; do ln -s $i 32$i ; done',
        '    popd',
        'fi',
    ];
    return [...loop('/usr/lib32/pkgconfig'), ...loop('/usr/share/pkgconfig')];
}

/* -------------------------------------------------------------------------- */
/* Alternative flag snippets                                                  */
/* -------------------------------------------------------------------------- */

/**
 * Flag snippets selected by the PGO options for the 64-bit flavours. The
 * Special variant prefers its own `altflags1_special`.
 */
export function variableExports(config: BuildConfiguration, kind: BuildSystemKind, variant: Variant): string[] {
    const o = config.options;
    const out: string[] = [];

    if (o.fsalt1 && !o.altflags_pgo) {
        const name: SnippetName = variant === 'Special' && hasSnippet(config, 'altflags1_special') ? 'altflags1_special' : 'altflags1';
        out.push(...snippetBlock(config, name));
    }
    if (variant === 'Special') return out;

    if (o.altflags_pgo && !o.fsalt1) {
        out.push(...snippetBlock(config, 'altflags_pgo'));
    }
    if (o.altflags_pgo_ext && !o.altflags_pgo && !o.fsalt1) {
        out.push(...snippetBlock(config, 'altflags_pgo'));
    }
    if (kind === 'cargo' && o.altcargo_pgo && !o.altflags_pgo_ext && !o.altflags_pgo && !o.fsalt1) {
        out.push(...snippetBlock(config, 'altflagsrust_pgo'));
    }
    return out;
}

/* -------------------------------------------------------------------------- */
/* Profile payload                                                            */
/* -------------------------------------------------------------------------- */

const RUNTIME_LIBRARY_PATH = [
    '/usr/local/nvidia/lib64',
    '/usr/local/nvidia/lib64/gbm',
    '/usr/local/nvidia/lib64/vdpau',
    '/usr/local/nvidia/lib64/xorg/modules/drivers',
    '/usr/local/nvidia/lib64/xorg/modules/extensions',
    '/usr/local/cuda/lib64',
    '/usr/lib64/haswell',
    '/usr/lib64/dri',
    '/usr/lib64',
    '/usr/lib',
    '/aot/intel/oneapi/compiler/latest/linux/compiler/lib/intel64_lin',
    '/aot/intel/oneapi/compiler/latest/linux/lib',
    '/aot/intel/oneapi/mkl/latest/lib/intel64',
    '/aot/intel/oneapi/tbb/latest/lib/intel64/gcc4.8',
    '/usr/share',
    '/usr/lib64/wine',
    '/usr/local/nvidia/lib32',
    '/usr/local/nvidia/lib32/vdpau',
    '/usr/lib32',
    '/usr/lib32/wine',
].join(':');

/** Snippet holding the training workload of a variant; special builds fall back to the default payload. */
export function payloadSnippet(config: BuildConfiguration, variant: Variant): SnippetName {
    if (variant === 'Special' && hasSnippet(config, 'profile_payload_special')) return 'profile_payload_special';
    if (variant === 'Special2' && hasSnippet(config, 'profile_payload_special2')) return 'profile_payload_special2';
    return 'profile_payload';
}

/** The training run: library paths reset around the workload lines. */
export function payloadBlock(config: BuildConfiguration, name: SnippetName): string[] {
    if (!hasSnippet(config, name)) return [];
    return [
        `## ${name} start`,
        'unset LD_LIBRARY_PATH',
        'unset LIBRARY_PATH',
        ...config.snippets[name],
        `export LD_LIBRARY_PATH="${RUNTIME_LIBRARY_PATH}"`,
        `export LIBRARY_PATH="${RUNTIME_LIBRARY_PATH}"`,
        `## ${name} end`,
    ];
}
