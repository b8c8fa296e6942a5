import { PgoPhase } from '../pgo';
import { Variant } from '../variant_matrix';
import { Composer, composeDialect } from './compose';
import { ComposeContext, Dialect, cmd, copiedTreeLocation } from './steps';

function wafArgs(ctx: ComposeContext, variant: Variant, phase: PgoPhase | null): string[] {
    const s = ctx.config.settings;
    if (variant === 'Special') return [s.extra_configure_special];
    if (variant === 'AVX2') return [s.extra_configure, s.extra_configure64, s.extra_configure_avx2];
    if (phase === 'USE' && (s.extra_configure_pgo || s.extra_configure64_pgo)) {
        return [s.extra_configure_pgo, s.extra_configure64_pgo];
    }
    return [s.extra_configure, s.extra_configure64];
}

const wafDialect: Dialect = {
    location: (ctx, variant) => copiedTreeLocation(ctx.config, variant),
    setup: () => ["sd -r 'allow_unknown=False' 'allow_unknown=True' waflib/ || :"],
    configure: (ctx, variant, phase) => [cmd('%waf --out=builddir', ...wafArgs(ctx, variant, phase), '|| :')],
    build: () => ['./waf build --verbose --jobs=20 --out=builddir'],
    install: ctx => [cmd('%waf_install -- --verbose', ctx.config.settings.extra_make_install)],
    clean: () => ['./waf distclean --verbose || :'],
};

export const composeWaf: Composer = ctx => composeDialect(ctx, wafDialect);
