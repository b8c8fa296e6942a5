import test from 'node:test';
import assert from 'node:assert/strict';

import {
    createBuildConfiguration,
    hasMacro,
    hasSnippet,
    isMacroName,
    isOptionName,
    isSettingName,
    isSnippetName,
    withOption,
} from '../src/build_config';

test('catalogue defaults fill every group', () => {
    const config = createBuildConfiguration({ name: 'zlib' });
    assert.equal(config.version, '');
    assert.equal(config.options.use_avx2, false);
    assert.equal(config.options['32bit_only'], false);
    assert.equal(config.settings.cmake_srcdir, '..');
    assert.equal(config.settings.subdir, '');
    assert.deepEqual(config.snippets.build_prepend, []);
    assert.deepEqual(config.macros.make_macro, []);
    assert.equal(config.source_date_epoch, 0);
    assert.equal(config.tests, '');
});

test('input overrides merge over the defaults', () => {
    const config = createBuildConfiguration({
        name: 'zlib',
        options: { use_avx2: true },
        settings: { extra_configure: '--with-foo' },
        snippets: { build_prepend: ['echo hi'] },
    });
    assert.equal(config.options.use_avx2, true);
    assert.equal(config.options.use_avx512, false);
    assert.equal(config.settings.extra_configure, '--with-foo');
    assert.equal(config.settings.cmake_srcdir, '..');
    assert.equal(hasSnippet(config, 'build_prepend'), true);
    assert.equal(hasSnippet(config, 'build_append'), false);
});

test('withOption derives a copy and leaves the original alone', () => {
    const config = createBuildConfiguration({ name: 'zlib' });
    const flipped = withOption(config, 'altflags_pgo_ext_phase', true);
    assert.equal(flipped.options.altflags_pgo_ext_phase, true);
    assert.equal(config.options.altflags_pgo_ext_phase, false);
    assert.equal(flipped.name, 'zlib');
});

test('list inputs are copied', () => {
    const patches = ['fix-build.patch'];
    const config = createBuildConfiguration({ name: 'zlib', patches });
    patches.push('late.patch');
    assert.deepEqual(config.patches, ['fix-build.patch']);
});

test('catalogue lookups reject unknown names', () => {
    assert.equal(isOptionName('use_avx2'), true);
    assert.equal(isOptionName('use_avx3'), false);
    assert.equal(isOptionName('toString'), false);
    assert.equal(isSettingName('extra_cmake'), true);
    assert.equal(isSnippetName('profile_payload'), true);
    assert.equal(isMacroName('install_macro_avx2'), true);
    assert.equal(isMacroName('install_macro_avx3'), false);
});

test('hasMacro is true only for non-empty overrides', () => {
    const config = createBuildConfiguration({ name: 'zlib', macros: { make_macro: ['make all'], install_macro: [] } });
    assert.equal(hasMacro(config, 'make_macro'), true);
    assert.equal(hasMacro(config, 'install_macro'), false);
});
