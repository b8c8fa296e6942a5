/**
 * Round log archive: moves results/<log>.log to results/round<N>-<log>.log so
 * the next round cannot overwrite it.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ROUND_LOGS, SANDBOX } from './config';
import { createLogger } from './logger';
import { ErrorFactory } from './structured_error';

const log = createLogger('log-archive');

export function archivedLogName(round: number, name: string): string {
    return `round${round}-${name}.log`;
}

/** Archive one round's logs; returns the archived file names. Missing logs are skipped with a warning. */
export function archiveRoundLogs(target: string, round: number, names: readonly string[] = ROUND_LOGS): string[] {
    const results = path.join(target, SANDBOX.RESULTS_DIR);
    const archived: string[] = [];

    for (const name of names) {
        const from = path.join(results, `${name}.log`);
        if (!fs.existsSync(from)) {
            log.warn(`No ${name}.log for round ${round}`);
            continue;
        }
        const to = archivedLogName(round, name);
        try {
            fs.renameSync(from, path.join(results, to));
        } catch (e) {
            throw ErrorFactory.filesystem('archive log', from, e instanceof Error ? e.message : String(e));
        }
        archived.push(to);
    }
    return archived;
}
