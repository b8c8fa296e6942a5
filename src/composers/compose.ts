import { DirectiveStream } from '../directive_stream';
import { PrepOptions, writePrep } from './prep';
import { ComposeContext, Dialect, openBuild, writeBuildSteps, writeCheck, writeInstall } from './steps';

/** A composer turns one resolved context into the recipe body. */
export type Composer = (ctx: ComposeContext) => DirectiveStream;

/** %prep, one %build block per variant, %check and %install, all driven by a dialect. */
export function composeDialect(ctx: ComposeContext, dialect: Dialect, prep: PrepOptions = {}): DirectiveStream {
    const out = new DirectiveStream();
    writePrep(out, ctx, prep);
    openBuild(out, ctx.config);
    writeBuildSteps(out, ctx, dialect);
    writeCheck(out, ctx.config);
    writeInstall(out, ctx, dialect);
    return out;
}
