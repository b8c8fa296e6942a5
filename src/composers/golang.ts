import * as path from 'path';
import { DirectiveStream } from '../directive_stream';
import { snippetBlock } from '../flags';
import { Composer, composeDialect } from './compose';
import { writePrep } from './prep';
import { Dialect, cmd, copiedTreeLocation } from './steps';

const PROXY_ORIGIN = 'https://proxy.golang.org/';

const golangDialect: Dialect = {
    location: (ctx, variant) => copiedTreeLocation(ctx.config, variant),
    setup: ctx => ctx.config.options.set_gopath
        ? ['export GOPATH="$PWD"']
        : ['export GOPROXY=file:///usr/share/goproxy', 'go mod vendor'],
    build: ctx => ctx.config.options.set_gopath
        ? [cmd('go build', ctx.config.settings.extra_make)]
        : [cmd('go build -mod=vendor', ctx.config.settings.extra_make)],
    install: () => [],
    clean: () => [],
};

export const composeGolang: Composer = ctx => composeDialect(ctx, golangDialect);

/** Directory under the packaged module proxy that mirrors the source URL's module path. */
export function goproxyDir(url: string): string {
    const modulePath = url.startsWith(PROXY_ORIGIN) ? url.slice(PROXY_ORIGIN.length) : url;
    return path.posix.join('%{buildroot}/usr/share/goproxy', path.posix.dirname(modulePath));
}

/**
 * Module proxy packages: nothing is built, each source file is installed into
 * the proxy tree and the packaged versions are listed.
 */
export const composeGodep: Composer = ctx => {
    const { config, layout } = ctx;
    const seed = layout.seed;
    const out = new DirectiveStream();
    writePrep(out, ctx, { setup: 'none' });

    const proxy = goproxyDir(seed.url);
    out.section('%install');
    out.verbatim(snippetBlock(config, 'install_prepend'));
    out.line('rm -fr %{buildroot}');
    out.line(`mkdir -p ${proxy}`);
    out.line('# Create list file using packaged versions');
    for (const version of seed.godep_versions) {
        out.line(`echo ${version} >> ${proxy}/list`);
    }
    [...seed.godep].sort().forEach((source, idx) => {
        out.line(`install -m 0644 %{SOURCE${idx + 1}} ${proxy}/${path.posix.basename(source)}`);
    });
    return out;
};
