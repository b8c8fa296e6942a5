/**
 * Python composers: setup.py (distutils3, distutils36) and wheel-based
 * pyproject builds. The AVX2 variant is an x86-64-v3 rebuild in
 * `../buildavx2` that installs into `%{buildroot}-v3`.
 */

import { pythonV3Exports } from '../flags';
import { Variant } from '../variant_matrix';
import { Composer, composeDialect } from './compose';
import { ComposeContext, Dialect, cmd, copiedTreeLocation } from './steps';

const REQUIRES_DUMP = [
    'echo ----[ mark ]----',
    'cat %{buildroot}/usr/lib/python3*/site-packages/*/requires.txt || :',
    'echo ----[ mark ]----',
];

function depFixes(ctx: ComposeContext, root: string): string[] {
    return ctx.config.snippets.pypi_overrides.map(module => `pypi-dep-fix.py ${root} ${module}`);
}

function installRoot(variant: Variant): string {
    return variant === 'AVX2' ? '%{buildroot}-v3' : '%{buildroot}';
}

const v3Profile = (_ctx: ComposeContext, variant: Variant): string[] | null =>
    variant === 'AVX2' ? pythonV3Exports() : null;

/* -------------------------------------------------------------------------- */
/* setup.py                                                                   */
/* -------------------------------------------------------------------------- */

const distutils3Dialect: Dialect = {
    location: (ctx, variant) => copiedTreeLocation(ctx.config, variant),
    profile: v3Profile,
    setup: ctx => ['export MAKEFLAGS=%{?_smp_mflags}', ...depFixes(ctx, '.')],
    build: ctx => {
        const build = cmd('python3 setup.py build -j 20', ctx.config.settings.extra_configure);
        return [
            'if [ ! -f setup.py ]; then',
            'printf "#!/usr/bin/env python\\nfrom setuptools import setup\\nsetup()" > setup.py',
            'chmod +x setup.py',
            build,
            'else',
            build,
            'fi',
        ];
    },
    install: (ctx, variant) => {
        if (variant === 'AVX2') {
            return [...pythonV3Exports(), `python3 -tt setup.py build install --root=${installRoot(variant)}`];
        }
        return [
            `python3 -tt setup.py build -j 20 install --root=${installRoot(variant)}`,
            ...depFixes(ctx, '%{buildroot}'),
            ...REQUIRES_DUMP,
        ];
    },
    clean: () => [],
};

const distutils36Dialect: Dialect = {
    location: (ctx, variant) => copiedTreeLocation(ctx.config, variant),
    build: ctx => [cmd('python3.6 setup.py build -b py3', ctx.config.settings.extra_configure)],
    install: () => ['python3.6 -tt setup.py build -b py3 install --root=%{buildroot} --force', ...REQUIRES_DUMP],
    clean: () => [],
};

/* -------------------------------------------------------------------------- */
/* pyproject                                                                  */
/* -------------------------------------------------------------------------- */

const pyprojectDialect: Dialect = {
    location: (ctx, variant) => copiedTreeLocation(ctx.config, variant),
    profile: v3Profile,
    setup: ctx => ['export MAKEFLAGS=%{?_smp_mflags}', ...depFixes(ctx, '.')],
    build: ctx => [cmd('python3 -m build --wheel --skip-dependency-check --no-isolation', ctx.config.settings.extra_configure)],
    install: (ctx, variant) => {
        const pip = `pip install --root=${installRoot(variant)} --no-deps --ignore-installed dist/*.whl`;
        if (variant === 'AVX2') return [...pythonV3Exports(), pip];
        return [pip, ...depFixes(ctx, '%{buildroot}'), ...REQUIRES_DUMP];
    },
    clean: () => [],
};

export const composeDistutils3: Composer = ctx => composeDialect(ctx, distutils3Dialect);
export const composeDistutils36: Composer = ctx => composeDialect(ctx, distutils36Dialect);
export const composePyproject: Composer = ctx => composeDialect(ctx, pyprojectDialect);
