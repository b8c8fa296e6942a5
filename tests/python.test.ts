import test from 'node:test';
import assert from 'node:assert/strict';

import { compose, count, pushdDepths } from './helpers';

const V3_EXPORTS = [
    'export CFLAGS="$CFLAGS -m64 -march=x86-64-v3 -Wl,-z,x86-64-v3"',
    'export CXXFLAGS="$CXXFLAGS -m64 -march=x86-64-v3 -Wl,-z,x86-64-v3"',
    'export FFLAGS="$FFLAGS -m64 -march=x86-64-v3 -Wl,-z,x86-64-v3"',
    'export FCFLAGS="$FCFLAGS -m64 -march=x86-64-v3"',
    'export LDFLAGS="$LDFLAGS -m64 -march=x86-64-v3"',
];

const REQUIRES_DUMP = [
    'echo ----[ mark ]----',
    'cat %{buildroot}/usr/lib/python3*/site-packages/*/requires.txt || :',
    'echo ----[ mark ]----',
];

test('setup.py AVX2 build installs into the -v3 root', () => {
    const out = compose('distutils3', { options: { use_avx2: true }, snippets: { pypi_overrides: ['requests'] } });
    assert.deepEqual(out.sectionLines('%install'), [
        'export SOURCE_DATE_EPOCH=1700000000',
        'rm -rf %{buildroot}',
        'pushd ../buildavx2',
        ...V3_EXPORTS,
        'python3 -tt setup.py build install --root=%{buildroot}-v3',
        'popd',
        'python3 -tt setup.py build -j 20 install --root=%{buildroot}',
        'pypi-dep-fix.py %{buildroot} requests',
        ...REQUIRES_DUMP,
    ]);

    const build = out.sectionLines('%build');
    const avx2 = build.indexOf('pushd ../buildavx2');
    assert.deepEqual(build.slice(avx2 + 1, avx2 + 8), [
        ...V3_EXPORTS,
        'export MAKEFLAGS=%{?_smp_mflags}',
        'pypi-dep-fix.py . requests',
    ]);
    assert.equal(count(build, 'pypi-dep-fix.py . requests'), 2);
    assert.equal(count(build, 'python3 setup.py build -j 20'), 4);
    assert.equal(build.at(-1), 'popd');
});

test('a missing setup.py is generated before building', () => {
    const build = compose('distutils3').sectionLines('%build').slice(7);
    assert.equal(build[0], 'export MAKEFLAGS=%{?_smp_mflags}');
    assert.equal(build[1], 'if [ ! -f setup.py ]; then');
    assert.ok(build[2].startsWith('printf "#!/usr/bin/env python'));
    assert.deepEqual(build.slice(3), ['chmod +x setup.py', 'python3 setup.py build -j 20', 'else', 'python3 setup.py build -j 20', 'fi']);
});

test('pyproject builds a wheel and installs it with pip', () => {
    const out = compose('pyproject', { options: { use_avx2: true } });
    assert.equal(count(out.sectionLines('%build'), 'python3 -m build --wheel --skip-dependency-check --no-isolation'), 2);
    assert.deepEqual(out.sectionLines('%install'), [
        'export SOURCE_DATE_EPOCH=1700000000',
        'rm -rf %{buildroot}',
        'pushd ../buildavx2',
        ...V3_EXPORTS,
        'pip install --root=%{buildroot}-v3 --no-deps --ignore-installed dist/*.whl',
        'popd',
        'pip install --root=%{buildroot} --no-deps --ignore-installed dist/*.whl',
        ...REQUIRES_DUMP,
    ]);
});

test('python 3.6 builds once, AVX2 or not', () => {
    const out = compose('distutils36', { options: { use_avx2: true } });
    assert.equal(out.sectionLines('%prep').some(l => l.startsWith('cp -a')), false);
    assert.deepEqual(out.sectionLines('%build').slice(7), ['python3.6 setup.py build -b py3']);
    assert.deepEqual(out.sectionLines('%install').slice(2), [
        'python3.6 -tt setup.py build -b py3 install --root=%{buildroot} --force',
        ...REQUIRES_DUMP,
    ]);
});

test('python subdirs stay balanced in the copied AVX2 tree', () => {
    const out = compose('distutils3', { options: { use_avx2: true }, settings: { subdir: 'python' } });
    const build = out.sectionLines('%build');
    const install = out.sectionLines('%install');
    assert.deepEqual(build.filter(l => l.startsWith('pushd')), ['pushd python', 'pushd ../buildavx2/python']);
    assert.deepEqual(install.filter(l => l.startsWith('pushd')), ['pushd ../buildavx2/python', 'pushd python']);
    assert.deepEqual(pushdDepths(install).slice(2), Array.from({ length: 14 }, () => 1));
});
