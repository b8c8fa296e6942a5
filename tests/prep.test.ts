import test from 'node:test';
import assert from 'node:assert/strict';

import { createBuildConfiguration } from '../src/build_config';
import { SourceLayout } from '../src/source_layout';
import { synthesize } from '../src/synthesizer';
import { DEMO_URL, compose, demoInput, demoSeed } from './helpers';

test('a plain prefix is unpacked with %setup -n', () => {
    assert.deepEqual(compose('configure').sectionLines('%prep'), ['%setup -q -n demo-1.0', 'cd %{_builddir}/demo-1.0']);
});

test('a nested prefix is flattened into its last component', () => {
    const prep = compose('configure', {}, demoSeed({ prefix: 'src/demo-1.0', tarball_prefix: 'src/demo-1.0' })).sectionLines('%prep');
    assert.deepEqual(prep, [
        '%setup -c -n demo-1.0',
        "find src/demo-1.0 -mindepth 1 -name '*' -exec mv -n {} ./ \\; || :",
        'cd %{_builddir}/demo-1.0',
    ]);
});

test('an archive without a prefix gets an invented directory that later phases resolve', () => {
    const layout = new SourceLayout(demoSeed({ prefix: '', tarball_prefix: '' }));
    const out = synthesize('configure', createBuildConfiguration(demoInput()), layout);
    assert.deepEqual(out.sectionLines('%prep'), ['%setup -q -c -n demo-1.0.tar', 'cd %{_builddir}/demo-1.0.tar']);
    assert.deepEqual(layout.resolve(DEMO_URL), { prefix: 'demo-1.0.tar', invented: true });
});

test('auxiliary archives are extracted and copied to their destination', () => {
    const seed = demoSeed({
        archives: [
            { url: 'https://example.org/extra-2.0.tar.gz', prefix: 'extra-2.0', destination: 'third_party/extra' },
            { url: 'https://example.org/data.zip', prefix: '', destination: '' },
            { url: 'https://example.org/meta.jar', prefix: '', destination: '' },
        ],
    });
    assert.deepEqual(compose('configure', {}, seed).sectionLines('%prep'), [
        '%setup -q -n demo-1.0',
        'cd %{_builddir}',
        'tar xf %{_sourcedir}/extra-2.0.tar.gz',
        'cd %{_builddir}',
        'mkdir -p data',
        'cd data',
        'unzip -q %{_sourcedir}/data.zip',
        'cd %{_builddir}/demo-1.0',
        'mkdir -p third_party/extra',
        'cp -a %{_builddir}/extra-2.0/* %{_builddir}/demo-1.0/third_party/extra',
    ]);
});

test('patches are numbered in order, skipped entries keep their number', () => {
    const seed = demoSeed({
        versions: [{ url: 'https://example.org/demo-0.9.tar.gz', version: '0.9', prefix: 'demo-0.9', source_index: 1 }],
    });
    const prep = compose('configure', {
        patches: ['a.patch', 'skip.nopatch', 'b.patch -p0'],
        version_patches: { '0.9': ['old-fix.patch -p2'] },
    }, seed).sectionLines('%prep');
    assert.deepEqual(prep, [
        '%setup -q -n demo-1.0',
        'cd %{_builddir}/demo-1.0',
        'cd ..',
        '%setup -q -T -n demo-0.9 -b 1',
        '%patch1 -p1',
        '%patch3 -p0',
        'cd ../demo-0.9',
        '%patch4 -p2',
    ]);
});

test('every copied variant gets a snapshot of the primary tree, in canonical order', () => {
    const prep = compose('configure', { options: { use_avx2: true, '32bit': true } }).sectionLines('%prep');
    assert.deepEqual(prep.slice(2), [
        'pushd %{_builddir}',
        'cp -a %{_builddir}/demo-1.0 build32',
        'popd',
        'pushd %{_builddir}',
        'cp -a %{_builddir}/demo-1.0 buildavx2',
        'popd',
    ]);
});

test('R sources unpack into a combined directory', () => {
    assert.equal(compose('R').sectionLines('%prep')[0], '%setup -q -c -n demo-1.0');
});

test('vendored cargo builds fetch their crates in %prep', () => {
    const prep = compose('cargo', { options: { altcargo1: true } }).sectionLines('%prep');
    assert.deepEqual(prep.slice(2), [
        'export CARGO_NET_GIT_FETCH_WITH_CLI=true',
        'export SSL_CERT_FILE=/var/cache/ca-certs/anchors/ca-certificates.crt',
        'export CARGO_HTTP_CAINFO=/var/cache/ca-certs/anchors/ca-certificates.crt',
        'cargo update --verbose',
        'cargo fetch --verbose',
    ]);
});
