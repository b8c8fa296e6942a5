/**
 * Directive Stream
 *
 * Append-only, sectioned line sink every composer writes through. Sections
 * are opened in order and never revisited; `render` produces the canonical
 * text that is persisted and diffed across revisions.
 */

export type SectionName = '%prep' | '%build' | '%check' | '%install';

interface SectionMark {
    name: SectionName;
    /** Index of the first line after the section header. */
    start: number;
}

export class DirectiveStream {
    private readonly buffer: string[] = [];
    private readonly marks: SectionMark[] = [];

    /** Open a new section. Trailing blank lines of the previous one are dropped. */
    section(name: SectionName): this {
        this.trimTrailingBlank();
        if (this.buffer.length > 0) this.buffer.push('');
        this.buffer.push(name);
        this.marks.push({ name, start: this.buffer.length });
        return this;
    }

    /**
     * Append one directive. Embedded newlines split it into several lines and
     * trailing whitespace is stripped from each.
     */
    line(text: string): this {
        for (const part of text.split('\n')) {
            this.buffer.push(part.replace(/\s+$/, ''));
        }
        return this;
    }

    lines(texts: readonly string[]): this {
        for (const text of texts) this.line(text);
        return this;
    }

    /** Append lines exactly as given (snippet and override content). */
    verbatim(texts: readonly string[]): this {
        for (const text of texts) this.buffer.push(text);
        return this;
    }

    /** Append a single separator line unless the stream already ends in one. */
    blank(): this {
        if (this.buffer.length > 0 && this.buffer[this.buffer.length - 1] !== '') {
            this.buffer.push('');
        }
        return this;
    }

    trimTrailingBlank(): this {
        while (this.buffer.length > 0 && this.buffer[this.buffer.length - 1].trim() === '') {
            this.buffer.pop();
        }
        return this;
    }

    sectionNames(): SectionName[] {
        return this.marks.map(m => m.name);
    }

    /** Body lines of the named section (header excluded, trailing blanks dropped). */
    sectionLines(name: SectionName): string[] {
        const idx = this.marks.findIndex(m => m.name === name);
        if (idx === -1) return [];
        const start = this.marks[idx].start;
        const end = idx + 1 < this.marks.length ? this.marks[idx + 1].start - 1 : this.buffer.length;
        const body = this.buffer.slice(start, end);
        while (body.length > 0 && body[body.length - 1].trim() === '') body.pop();
        return body;
    }

    toLines(): readonly string[] {
        return this.buffer;
    }

    render(): string {
        const copy = [...this.buffer];
        while (copy.length > 0 && copy[copy.length - 1].trim() === '') copy.pop();
        return copy.length === 0 ? '' : copy.join('\n') + '\n';
    }
}
