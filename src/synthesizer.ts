/**
 * Recipe Synthesis Engine
 *
 * `synthesize(kind, config, layout)` resolves the decision table for the
 * kind, then hands it to the kind's composer. Dispatch is an exhaustive
 * switch over BuildSystemKind; adding a kind without a composer is a
 * compile error.
 *
 * Synthesis is pure with respect to earlier calls: the same inputs always
 * produce the same stream. The only side effect is recording unpack
 * directories in `layout`, which is idempotent.
 */

import { BuildConfiguration } from './build_config';
import {
    composeAutogen,
    composeBuildtclConfigure,
    composeBuildtclScript,
    composeConfigure,
    composeConfigureAc,
    composeMake,
    composePhpize,
} from './composers/autotools';
import { composeCargo } from './composers/cargo';
import { composeCmake } from './composers/cmake';
import { Composer } from './composers/compose';
import { composeGodep, composeGolang } from './composers/golang';
import { composeMeson } from './composers/meson';
import { composeDistutils3, composeDistutils36, composePyproject } from './composers/python';
import { composeQmake } from './composers/qmake';
import { composeCpan, composeNginx, composeR, composeRuby, composeScons } from './composers/simple';
import { composeWaf } from './composers/waf';
import { planSteps } from './decision_table';
import { DirectiveStream } from './directive_stream';
import { BuildSystemKind, assertNever } from './kinds';
import { SourceLayout } from './source_layout';

export function composerFor(kind: BuildSystemKind): Composer {
    switch (kind) {
        case 'make': return composeMake;
        case 'configure': return composeConfigure;
        case 'configure_ac': return composeConfigureAc;
        case 'autogen': return composeAutogen;
        case 'cmake': return composeCmake;
        case 'meson': return composeMeson;
        case 'scons': return composeScons;
        case 'waf': return composeWaf;
        case 'qmake': return composeQmake;
        case 'cargo': return composeCargo;
        case 'golang': return composeGolang;
        case 'godep': return composeGodep;
        case 'ruby': return composeRuby;
        case 'cpan': return composeCpan;
        case 'distutils3': return composeDistutils3;
        case 'distutils36': return composeDistutils36;
        case 'pyproject': return composePyproject;
        case 'R': return composeR;
        case 'buildtcl_script': return composeBuildtclScript;
        case 'buildtcl_configure': return composeBuildtclConfigure;
        case 'phpize': return composePhpize;
        case 'nginx': return composeNginx;
        default: return assertNever(kind);
    }
}

export function synthesize(kind: BuildSystemKind, config: BuildConfiguration, layout: SourceLayout): DirectiveStream {
    const table = planSteps(kind, config);
    return composerFor(kind)({ kind, config, layout, table });
}
