import test from 'node:test';
import assert from 'node:assert/strict';

import { AVX2_EXPORTS, compose, count } from './helpers';

const WAF_FIXUP = "sd -r 'allow_unknown=False' 'allow_unknown=True' waflib/ || :";

test('waf builds the primary tree and the AVX2 copy', () => {
    const out = compose('waf', { options: { use_avx2: true }, settings: { extra_configure_avx2: '--enable-simd' } });
    assert.deepEqual(out.sectionLines('%build').slice(7), [
        WAF_FIXUP,
        '%waf --out=builddir || :',
        './waf build --verbose --jobs=20 --out=builddir',
        '',
        'pushd ../buildavx2',
        ...AVX2_EXPORTS,
        WAF_FIXUP,
        '%waf --out=builddir --enable-simd || :',
        './waf build --verbose --jobs=20 --out=builddir',
        'popd',
    ]);
    assert.deepEqual(out.sectionLines('%install').slice(2), [
        'pushd ../buildavx2',
        '%waf_install -- --verbose',
        'popd',
        '%waf_install -- --verbose',
    ]);
});

test('waf in-process PGO cleans with distclean between the phases', () => {
    const build = compose('waf', {
        options: { altflags_pgo: true },
        snippets: { profile_payload: ['./bench'] },
    }).sectionLines('%build');
    assert.equal(count(build, './waf distclean --verbose || :'), 1);
    assert.equal(count(build, '%waf --out=builddir || :'), 2);
    assert.ok(build.indexOf('./waf distclean --verbose || :') > build.indexOf('./bench'));
});
