import test from 'node:test';
import assert from 'node:assert/strict';

import { PROXY_LINES, compose } from './helpers';

const MAKE = 'make %{?_smp_mflags} V=1 VERBOSE=1';
const LIB32 = '--libdir=/usr/lib32 --build=i686-generic-linux-gnu --host=i686-generic-linux-gnu --target=i686-clr-linux-gnu';

/** %build lines after the shared environment preamble and its separator. */
function steps(lines: string[]): string[] {
    return lines.slice(PROXY_LINES.length + 3);
}

test('configure builds the primary tree in place', () => {
    const out = compose('configure', { settings: { extra_configure: '--enable-foo' } });
    assert.deepEqual(steps(out.sectionLines('%build')), ['%configure --disable-static --enable-foo', MAKE]);
    assert.deepEqual(out.sectionLines('%install'), ['export SOURCE_DATE_EPOCH=1700000000', 'rm -rf %{buildroot}', '%make_install']);
});

test('keepstatic drops --disable-static', () => {
    const out = compose('configure', { options: { keepstatic: true } });
    assert.deepEqual(steps(out.sectionLines('%build')), ['%configure', MAKE]);
});

test('plain make passes the flag variables on the command line', () => {
    const out = compose('make');
    assert.deepEqual(steps(out.sectionLines('%build')), [
        'make %{?_smp_mflags} V=1 VERBOSE=1 CFLAGS="${CFLAGS}" ASMFLAGS="${ASMFLAGS}" CXXFLAGS="${CXXFLAGS}" FFLAGS="${FFLAGS}" FCFLAGS="${FCFLAGS}" LDFLAGS="${LDFLAGS}" LIBS+="${LIBS}"',
    ]);
});

test('broken_parallel_build drops the parallel flag', () => {
    const out = compose('configure', { options: { broken_parallel_build: true } });
    assert.ok(out.sectionLines('%build').includes('make V=1 VERBOSE=1'));
});

test('autogen patches version detection before configuring', () => {
    const out = compose('autogen', { options: { disable_maintainer: true } });
    assert.deepEqual(steps(out.sectionLines('%build')), [
        "sd -r '\\s--dirty\\s' ' ' .",
        "sd -r 'git describe' 'git describe --abbrev=0' .",
        "sd --flags mi '^AC_INIT\\((.*\\n.*\\)|.*\\))' '$0\\nAM_MAINTAINER_MODE([disable])' configure.ac",
        '%autogen --disable-static',
        MAKE,
    ]);
    assert.ok(compose('autogen', { options: { autogen_simple: true } }).sectionLines('%build').includes('%autogen_simple --disable-static'));
});

test('configure_ac reconfigures', () => {
    assert.equal(steps(compose('configure_ac').sectionLines('%build'))[0], '%reconfigure --disable-static');
});

test('the 32-bit variant builds and installs in its copied tree', () => {
    const out = compose('configure', { options: { '32bit': true } });
    const build = out.sectionLines('%build');
    const enter = build.indexOf('pushd ../build32');
    assert.notEqual(enter, -1);
    assert.equal(build[enter + 1], 'export AR=gcc-ar');
    assert.ok(build.slice(enter).includes(`%configure --disable-static ${LIB32}`));

    const install = out.sectionLines('%install');
    const at = install.indexOf('%make_install32');
    assert.equal(install[at - 1], 'pushd ../build32');
    assert.deepEqual(install.slice(at + 1, at + 4), [
        'if [ -d %{buildroot}/usr/lib32/pkgconfig ]',
        'then',
        '    pushd %{buildroot}/usr/lib32/pkgconfig',
    ]);
    assert.ok(install.indexOf('%make_install32') < install.indexOf('%make_install'));
});

test('OpenMPI loads its module around configure and install', () => {
    const out = compose('configure', { options: { openmpi: true } });
    const build = out.sectionLines('%build');
    const enter = build.indexOf('pushd ../build-openmpi');
    assert.deepEqual(build.slice(enter + 1, enter + 3), ['. /usr/share/defaults/etc/profile.d/modules.sh', 'module load openmpi']);
    const configure = build.find(l => l.startsWith('./configure '));
    assert.ok(configure?.startsWith('./configure --program-prefix= --exec-prefix=$MPI_ROOT'));
    assert.deepEqual(build.slice(-2), ['module unload openmpi', 'popd']);

    const install = out.sectionLines('%install');
    const at = install.indexOf('%make_install_openmpi');
    assert.deepEqual(install.slice(at - 3, at + 3), [
        'pushd ../build-openmpi',
        '. /usr/share/defaults/etc/profile.d/modules.sh',
        'module load openmpi',
        '%make_install_openmpi',
        'module unload openmpi',
        'popd',
    ]);
});

test('license files and locales bracket the install section', () => {
    const out = compose('configure', {
        options: { findlang: true, asneeded: true },
        license_files: [{ path: 'demo-1.0/COPYING', hash: 'abc123' }],
        locales: ['demo'],
    });
    assert.deepEqual(out.sectionLines('%install'), [
        'export SOURCE_DATE_EPOCH=1700000000',
        'rm -rf %{buildroot}',
        'mkdir -p %{buildroot}/usr/share/package-licenses/demo',
        'cp %{_builddir}/demo-1.0/COPYING %{buildroot}/usr/share/package-licenses/demo/abc123',
        '%make_install',
        '## start %find_lang macros',
        '%find_lang demo',
        '## end %find_lang macros',
    ]);
    assert.equal(out.sectionLines('%build')[6], 'unset LD_AS_NEEDED');
});

test('%check runs the test command with the proxy locked out', () => {
    const out = compose('configure', { tests: 'make check' });
    assert.deepEqual(out.sectionLines('%check'), ['export LANG=C.UTF-8', ...PROXY_LINES, 'make check']);
});

test('build.tcl script builds both trees and installs with its own macro', () => {
    const out = compose('buildtcl_script', { options: { '32bit': true } });
    const build = steps(out.sectionLines('%build'));
    assert.deepEqual(build.slice(0, 3), ['tclsh build.tcl', MAKE, '']);
    assert.equal(build[3], 'pushd ../build32');
    assert.deepEqual(build.slice(-3), ['tclsh build.tcl', MAKE, 'popd']);

    const install = out.sectionLines('%install');
    assert.equal(install.filter(l => l === '%buildtcl_script_install').length, 2);
    assert.equal(install[install.indexOf('pushd ../build32') + 1], '%buildtcl_script_install');
    assert.equal(install.at(-1), '%buildtcl_script_install');
});

test('build.tcl configure flavour passes the extra arguments', () => {
    const out = compose('buildtcl_configure', { settings: { extra_configure: '--enable-threads' } });
    assert.deepEqual(steps(out.sectionLines('%build')), ['%configure_buildtcl --enable-threads', MAKE]);
    assert.deepEqual(out.sectionLines('%install').slice(2), ['%buildtcl_configure_install']);
});

test('phpize prepares the extension before configuring', () => {
    const out = compose('phpize', { settings: { subdir: 'ext' } });
    assert.deepEqual(steps(out.sectionLines('%build')), ['pushd ext', 'phpize', '%configure --disable-static', MAKE, 'popd']);
    assert.deepEqual(out.sectionLines('%install').slice(2), ['pushd ext', '%make_install', 'popd']);
});
