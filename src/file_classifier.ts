/**
 * File Classifier
 *
 * Owns the recipe's %files list. The convergence driver hands it the
 * unpackaged files each sandbox round reports; a classifier that changed
 * its lists forces another round.
 */

import * as fs from 'fs';
import * as path from 'path';
import { atomicWriteFileSync } from './recipe_io/atomic_write';
import { ErrorFactory } from './structured_error';

export interface FileClassifier {
    /** Fold newly reported files into the lists. True when anything changed. */
    reclassify(files: readonly string[]): boolean;
    /** Body of the %files section. */
    filesSection(): string[];
}

export const FILE_LIST = 'files';

/**
 * Single-package classifier: every reported file joins the one %files list.
 * Persisted as `<target>/files`, one path per line.
 */
export class PackagedFileList implements FileClassifier {
    private readonly files = new Set<string>();

    constructor(initial: readonly string[] = []) {
        for (const f of initial) this.files.add(f);
    }

    static load(target: string): PackagedFileList {
        const file = path.join(target, FILE_LIST);
        if (!fs.existsSync(file)) return new PackagedFileList();
        const lines = fs.readFileSync(file, 'utf-8').split('\n').map(l => l.trim()).filter(l => l.length > 0);
        return new PackagedFileList(lines);
    }

    reclassify(files: readonly string[]): boolean {
        let changed = false;
        for (const f of files) {
            if (this.files.has(f)) continue;
            this.files.add(f);
            changed = true;
        }
        return changed;
    }

    filesSection(): string[] {
        return ['%defattr(-,root,root,-)', ...this.list()];
    }

    list(): string[] {
        return [...this.files].sort();
    }

    save(target: string, warnings: string[]): void {
        const file = path.join(target, FILE_LIST);
        const entries = this.list();
        try {
            atomicWriteFileSync({
                filePath: file,
                content: entries.length > 0 ? entries.join('\n') + '\n' : '',
                mode: 0o644,
                fsyncMode: 'BEST_EFFORT',
                warnings,
            });
        } catch (e) {
            throw ErrorFactory.filesystem('write file list', file, e instanceof Error ? e.message : String(e));
        }
    }
}
