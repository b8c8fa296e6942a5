/**
 * Single-variant composers: SCons, CPAN, nginx modules, Ruby gems and R
 * packages. Each builds once in the primary tree.
 */

import { Composer, composeDialect } from './compose';
import { ComposeContext, Dialect, cmd, copiedTreeLocation, makeLine, parallelFlag } from './steps';

const inPrimaryTree: Dialect['location'] = (ctx, variant) => copiedTreeLocation(ctx.config, variant);

/* -------------------------------------------------------------------------- */
/* SCons                                                                      */
/* -------------------------------------------------------------------------- */

const sconsDialect: Dialect = {
    location: inPrimaryTree,
    configure: ctx => [cmd('%scons_config O=3 V=1 VERBOSE=1', ctx.config.settings.extra_configure)],
    build: ctx => [cmd('scons', parallelFlag(ctx.config), 'O=3 V=1 VERBOSE=1', ctx.config.settings.extra_make)],
    install: ctx => [cmd('%scons_install O=3 V=1 VERBOSE=1', ctx.config.settings.extra_make_install)],
    clean: () => [],
};

/* -------------------------------------------------------------------------- */
/* CPAN                                                                       */
/* -------------------------------------------------------------------------- */

const cpanDialect: Dialect = {
    location: inPrimaryTree,
    build: (ctx, variant, phase) => [
        'if test -f Makefile.PL; then',
        '%{__perl} Makefile.PL',
        makeLine(ctx, variant, phase),
        'else',
        '%{__perl} Build.PL',
        './Build',
        'fi',
    ],
    install: ctx => {
        const extra = ctx.config.settings.extra_make_install;
        return [
            'if test -f Makefile.PL; then',
            cmd('make pure_install PERL_INSTALL_ROOT=%{buildroot} INSTALLDIRS=vendor', extra),
            'else',
            cmd('./Build install --installdirs=vendor --destdir=%{buildroot}', extra),
            'fi',
            "find %{buildroot} -type f -name .packlist -exec rm -f {} ';'",
            "find %{buildroot} -depth -type d -exec rmdir {} 2>/dev/null ';'",
            "find %{buildroot} -type f -name '*.bs' -empty -exec rm -f {} ';'",
            '%{_fixperms} %{buildroot}/*',
        ];
    },
    clean: () => [],
};

/* -------------------------------------------------------------------------- */
/* nginx                                                                      */
/* -------------------------------------------------------------------------- */

const nginxDialect: Dialect = {
    location: inPrimaryTree,
    configure: () => ['nginx-module configure'],
    build: () => ['nginx-module build'],
    install: () => ['nginx-module install %{buildroot}'],
    clean: () => [],
};

/* -------------------------------------------------------------------------- */
/* Ruby                                                                       */
/* -------------------------------------------------------------------------- */

const rubyDialect: Dialect = {
    location: inPrimaryTree,
    build: ctx => [`gem build ${ctx.config.name}.gemspec --output ${ctx.config.name}.gem`],
    install: ctx => [
        "%global gem_dir $(ruby -e'puts Gem.default_dir')",
        'gem install --verbose --local --force \\',
        '  --build-root %{buildroot} \\',
        '  --install-dir %{gem_dir} \\',
        '  --bindir %{_bindir} \\',
        ` ${ctx.config.name}.gem`,
    ],
    clean: () => [],
};

/* -------------------------------------------------------------------------- */
/* R                                                                          */
/* -------------------------------------------------------------------------- */

const R_LIBRARY = '%{buildroot}/usr/lib64/R/library';

/** CRAN name of the package: the recipe name minus its `R-` prefix. */
export function rPackageName(ctx: ComposeContext): string {
    return ctx.config.name.replace(/^R-/, '');
}

function makevars(extra: string): string[] {
    return [
        `echo "CFLAGS = $CFLAGS ${extra}" > ~/.R/Makevars`,
        `echo "FFLAGS = $FFLAGS ${extra}" >> ~/.R/Makevars`,
        `echo "CXXFLAGS = $CXXFLAGS ${extra}" >> ~/.R/Makevars`,
    ];
}

function stash(suffix: string): string {
    return `for i in \`find %{buildroot}/usr/lib64/R/ -name "*.so"\`; do mv $i $i.${suffix} ; mv $i.${suffix} ~/.stash/; done`;
}

const rDialect: Dialect = {
    location: inPrimaryTree,
    build: () => [],
    install: ctx => {
        const pkg = rPackageName(ctx);
        const native = '-march=native -mtune=native -ftree-vectorize -mno-vzeroupper';
        return [
            'export LANG=C.UTF-8',
            'export CFLAGS="$CFLAGS -O3 -flto -fno-semantic-interposition "',
            'export FCFLAGS="$FFLAGS -O3 -flto -fno-semantic-interposition "',
            'export FFLAGS="$FFLAGS -O3 -flto -fno-semantic-interposition "',
            'export CXXFLAGS="$CXXFLAGS -O3 -flto -fno-semantic-interposition "',
            'export AR=gcc-ar',
            'export RANLIB=gcc-ranlib',
            'export LDFLAGS="$LDFLAGS  -Wl,-z -Wl,relro"',
            `mkdir -p ${R_LIBRARY}`,
            'mkdir -p ~/.R',
            'mkdir -p ~/.stash',
            ...makevars(native),
            `R CMD INSTALL --install-tests --built-timestamp=\${SOURCE_DATE_EPOCH} --build  -l ${R_LIBRARY} ${pkg}`,
            stash('avx2'),
            ...makevars(native),
            `R CMD INSTALL --preclean --install-tests --no-test-load --built-timestamp=\${SOURCE_DATE_EPOCH} --build  -l ${R_LIBRARY} ${pkg}`,
            stash('avx512'),
            ...makevars('-ftree-vectorize'),
            `R CMD INSTALL --preclean --install-tests --built-timestamp=\${SOURCE_DATE_EPOCH} --build  -l ${R_LIBRARY} ${pkg}`,
            `cp ~/.stash/* ${R_LIBRARY}/*/libs/ || :`,
            '%{__rm} -rf %{buildroot}%{_datadir}/R/library/R.css',
        ];
    },
    clean: () => [],
};

/* -------------------------------------------------------------------------- */
/* Composers                                                                  */
/* -------------------------------------------------------------------------- */

export const composeScons: Composer = ctx => composeDialect(ctx, sconsDialect);
export const composeCpan: Composer = ctx => composeDialect(ctx, cpanDialect);
export const composeNginx: Composer = ctx => composeDialect(ctx, nginxDialect);
export const composeRuby: Composer = ctx =>
    composeDialect(ctx, rubyDialect, { setup: ctx.config.options.ruby_pattern_from_gemspec ? 'gem' : 'tarball' });
export const composeR: Composer = ctx => composeDialect(ctx, rDialect, { setup: 'combined' });
