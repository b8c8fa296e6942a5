// src/recipe_io/recipe_writer.ts

import * as path from "path";
import { BuildConfiguration } from "../build_config";
import { DirectiveStream } from "../directive_stream";
import { SourceSeed } from "../source_layout";
import { ErrorFactory } from "../structured_error";
import { FsyncMode, atomicWriteFileSync } from "./atomic_write";

export interface RecipeHeader {
    summary: string;
    license: string;
    release: number;
}

export const DEFAULT_HEADER: RecipeHeader = {
    summary: "No detailed summary available",
    license: "",
    release: 1,
};

export interface RecipeDocument {
    config: BuildConfiguration;
    seed: SourceSeed;
    body: DirectiveStream;
    /** Body of %files, as supplied by the file classifier. */
    files: readonly string[];
    header?: Partial<RecipeHeader>;
}

/** Source tags in index order: Source0 is the primary URL, then auxiliary archives, version and proxy sources. */
export function sourceTags(seed: SourceSeed): string[] {
    const byIndex = new Map<number, string>();
    byIndex.set(0, seed.url);
    let next = 1;
    const take = (url: string): void => {
        while (byIndex.has(next)) next++;
        byIndex.set(next, url);
    };
    for (const version of seed.versions) byIndex.set(version.source_index, version.url);
    for (const archive of seed.archives) take(archive.url);
    for (const dep of [...seed.godep].sort()) take(dep);

    return [...byIndex.entries()]
        .sort(([a], [b]) => a - b)
        .map(([idx, url]) => `Source${idx}`.padEnd(9) + `: ${url}`);
}

export function renderRecipe(doc: RecipeDocument): string {
    const header = { ...DEFAULT_HEADER, ...doc.header };
    const { config } = doc;

    const out: string[] = [
        `Name     : ${config.name}`,
        `Version  : ${config.version}`,
        `Release  : ${header.release}`,
        `URL      : ${doc.seed.url}`,
        ...sourceTags(doc.seed),
        `Summary  : ${header.summary}`,
        "Group    : Development/Tools",
    ];
    if (header.license) out.push(`License  : ${header.license}`);
    out.push("", "%description", header.summary, "");

    const body = doc.body.render();
    if (body) out.push(body.replace(/\n$/, ""), "");

    out.push("%files");
    out.push(...doc.files);
    return out.join("\n").replace(/\n+$/, "") + "\n";
}

export function recipePath(target: string, name: string): string {
    return path.join(target, `${name}.spec`);
}

/** Render and atomically persist the recipe; returns the path written. */
export function writeRecipe(target: string, doc: RecipeDocument, warnings: string[], fsyncMode: FsyncMode = "BEST_EFFORT"): string {
    const filePath = recipePath(target, doc.config.name);
    try {
        atomicWriteFileSync({
            filePath,
            content: renderRecipe(doc),
            mode: 0o644,
            fsyncMode,
            warnings,
        });
    } catch (e) {
        throw ErrorFactory.filesystem("write recipe", filePath, e instanceof Error ? e.message : String(e));
    }
    return filePath;
}
