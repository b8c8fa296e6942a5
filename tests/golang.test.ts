import test from 'node:test';
import assert from 'node:assert/strict';

import { goproxyDir } from '../src/composers/golang';
import { compose, demoSeed } from './helpers';

const MODULE_URL = 'https://proxy.golang.org/example.org/demo/@v/v1.1.0.zip';
const PROXY = '%{buildroot}/usr/share/goproxy/example.org/demo/@v';

test('go modules build from the packaged proxy by default', () => {
    const build = compose('golang').sectionLines('%build').slice(7);
    assert.deepEqual(build, ['export GOPROXY=file:///usr/share/goproxy', 'go mod vendor', 'go build -mod=vendor']);
});

test('set_gopath builds in GOPATH mode with the extra make arguments', () => {
    const build = compose('golang', { options: { set_gopath: true }, settings: { extra_make: '-tags netgo' } })
        .sectionLines('%build')
        .slice(7);
    assert.deepEqual(build, ['export GOPATH="$PWD"', 'go build -tags netgo']);
});

test('golang subdir wraps the build in one push', () => {
    const build = compose('golang', { settings: { subdir: 'cmd/demo' } }).sectionLines('%build').slice(7);
    assert.equal(build[0], 'pushd cmd/demo');
    assert.equal(build.at(-1), 'popd');
});

test('module proxy directory mirrors the module path', () => {
    assert.equal(goproxyDir(MODULE_URL), PROXY);
    assert.equal(goproxyDir('example.org/other/@v/list'), '%{buildroot}/usr/share/goproxy/example.org/other/@v');
});

test('godep populates the proxy with every packaged version', () => {
    const seed = demoSeed({
        url: MODULE_URL,
        godep: [MODULE_URL, 'https://proxy.golang.org/example.org/demo/@v/v1.0.0.mod'],
        godep_versions: ['v1.0.0', 'v1.1.0'],
    });
    const out = compose('godep', {}, seed);
    assert.deepEqual(out.sectionNames(), ['%prep', '%install']);
    assert.deepEqual(out.sectionLines('%prep'), []);
    assert.deepEqual(out.sectionLines('%install'), [
        'rm -fr %{buildroot}',
        `mkdir -p ${PROXY}`,
        '# Create list file using packaged versions',
        `echo v1.0.0 >> ${PROXY}/list`,
        `echo v1.1.0 >> ${PROXY}/list`,
        `install -m 0644 %{SOURCE1} ${PROXY}/v1.0.0.mod`,
        `install -m 0644 %{SOURCE2} ${PROXY}/v1.1.0.zip`,
    ]);
});
