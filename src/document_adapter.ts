/**
 * Document Adapter - turns an input .docx into content blocks for the artifact.
 *
 * Two strategies, chosen once at construction:
 *
 *   structural-copy  Rebuilds paragraphs and tables from their text and the
 *                    run attributes bold, italic, underline, font name and
 *                    size. Headers, footers, images, fields, numbering and
 *                    styles are dropped.
 *
 *   node-splicing    Copies every body-level node verbatim. Relationship
 *                    targets (images, hyperlinks, embedded objects) travel
 *                    with the node. Style and numbering definitions of the
 *                    source are not merged; unknown style ids fall back to
 *                    the artifact's defaults.
 */

import * as fs from 'fs';
import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';

import {
    ContentBlock,
    NodeRelationship,
    ParagraphBlock,
    TableBlock,
    TextRun,
} from './content_blocks';
import {
    DocxPackage,
    bodyBlocks,
    childrenNamed,
    contentTypeOf,
    loadContentTypes,
    readDocxPackage,
    readRelationships,
    resolveTarget,
    rootNamespaces,
} from './docx_package';
import { DocumentReadError, errorMessage } from './structured_error';
import { createLogger } from './logger';

const log = createLogger('adapter');

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type AdapterStrategy = 'structural-copy' | 'node-splicing';

export const ADAPTER_STRATEGIES: readonly AdapterStrategy[] = ['structural-copy', 'node-splicing'];

export interface InputFile {
    filename: string;
    path: string;
}

export interface DocumentAdapter {
    readonly strategy: AdapterStrategy;
    /** @throws DocumentReadError when the file is not a readable .docx */
    extract(input: InputFile): Promise<ContentBlock[]>;
}

export function isAdapterStrategy(value: string): value is AdapterStrategy {
    return value === 'structural-copy' || value === 'node-splicing';
}

export function createDocumentAdapter(strategy: AdapterStrategy): DocumentAdapter {
    switch (strategy) {
        case 'structural-copy': return new StructuralCopyAdapter();
        case 'node-splicing': return new NodeSplicingAdapter();
    }
}

/* -------------------------------------------------------------------------- */
/* Source access                                                              */
/* -------------------------------------------------------------------------- */

async function openSource(input: InputFile): Promise<DocxPackage> {
    let data: Buffer;
    try {
        data = fs.readFileSync(input.path);
    } catch (e) {
        throw new DocumentReadError(`Cannot read ${input.filename}`, { filename: input.filename }, e);
    }
    try {
        return await readDocxPackage(data);
    } catch (e) {
        throw new DocumentReadError(
            `${input.filename} is not a valid .docx document`,
            { filename: input.filename, reason: errorMessage(e) },
            e
        );
    }
}

/* -------------------------------------------------------------------------- */
/* Structural copy                                                            */
/* -------------------------------------------------------------------------- */

/** Elements whose w:r children belong to the enclosing paragraph's text flow. */
const RUN_CONTAINERS = new Set(['w:hyperlink', 'w:ins', 'w:smartTag']);

function toggleOn(doc: CheerioAPI, rPr: Element | undefined, name: string): boolean | undefined {
    if (!rPr) return undefined;
    const el = childrenNamed(doc, rPr, name)[0];
    if (!el) return undefined;
    const val = el.attribs['w:val'];
    return val === undefined || !['0', 'false', 'off'].includes(val);
}

function readRun(doc: CheerioAPI, r: Element): TextRun {
    let text = '';
    for (const child of doc(r).children().toArray()) {
        switch (child.name) {
            case 'w:t': text += doc(child).text(); break;
            case 'w:tab': text += '\t'; break;
            case 'w:cr': text += '\n'; break;
            case 'w:br':
                if (child.attribs['w:type'] !== 'page') text += '\n';
                break;
        }
    }

    const run: TextRun = { text };
    const rPr = childrenNamed(doc, r, 'w:rPr')[0];
    const bold = toggleOn(doc, rPr, 'w:b');
    const italic = toggleOn(doc, rPr, 'w:i');
    if (bold !== undefined) run.bold = bold;
    if (italic !== undefined) run.italic = italic;

    if (rPr) {
        const u = childrenNamed(doc, rPr, 'w:u')[0]?.attribs['w:val'];
        if (u && u !== 'none') run.underline = u;

        const fonts = childrenNamed(doc, rPr, 'w:rFonts')[0];
        const fontName = fonts?.attribs['w:ascii'] ?? fonts?.attribs['w:hAnsi'];
        if (fontName) run.fontName = fontName;

        const sz = Number.parseInt(childrenNamed(doc, rPr, 'w:sz')[0]?.attribs['w:val'] ?? '', 10);
        if (Number.isFinite(sz) && sz > 0) run.sizeHalfPoints = sz;
    }
    return run;
}

function readParagraph(doc: CheerioAPI, p: Element): ParagraphBlock {
    const runs: TextRun[] = [];
    for (const child of doc(p).children().toArray()) {
        if (child.name === 'w:r') {
            runs.push(readRun(doc, child));
        } else if (RUN_CONTAINERS.has(child.name)) {
            for (const r of childrenNamed(doc, child, 'w:r')) runs.push(readRun(doc, r));
        }
    }
    return { kind: 'paragraph', runs };
}

function readTable(doc: CheerioAPI, tbl: Element): TableBlock {
    const rows = childrenNamed(doc, tbl, 'w:tr').map((tr) =>
        childrenNamed(doc, tr, 'w:tc').map((tc) =>
            childrenNamed(doc, tc, 'w:p').map((p) => readParagraph(doc, p))
        )
    );
    return { kind: 'table', rows };
}

export class StructuralCopyAdapter implements DocumentAdapter {
    readonly strategy = 'structural-copy' as const;

    async extract(input: InputFile): Promise<ContentBlock[]> {
        const { document } = await openSource(input);
        const blocks: ContentBlock[] = [];
        let skipped = 0;

        for (const el of bodyBlocks(document).toArray()) {
            if (el.name === 'w:p') blocks.push(readParagraph(document, el));
            else if (el.name === 'w:tbl') blocks.push(readTable(document, el));
            else skipped++;
        }

        if (skipped > 0) {
            log.debug('structural copy dropped body nodes', { filename: input.filename, skipped });
        }
        return blocks;
    }
}

/* -------------------------------------------------------------------------- */
/* Node splicing                                                              */
/* -------------------------------------------------------------------------- */

function referencedRelationshipIds(doc: CheerioAPI, el: Element): Set<string> {
    const ids = new Set<string>();
    const collect = (node: Element): void => {
        for (const [name, value] of Object.entries(node.attribs)) {
            if (name.startsWith('r:')) ids.add(value);
        }
    };
    collect(el);
    doc(el).find('*').each((_, d) => collect(d));
    return ids;
}

export class NodeSplicingAdapter implements DocumentAdapter {
    readonly strategy = 'node-splicing' as const;

    async extract(input: InputFile): Promise<ContentBlock[]> {
        const pkg = await openSource(input);
        const { zip, mainPartName, document } = pkg;
        const relationships = new Map((await readRelationships(zip, mainPartName)).map((r) => [r.id, r]));
        const contentTypes = await loadContentTypes(zip);
        const namespaces = rootNamespaces(document);
        const blocks: ContentBlock[] = [];

        for (const el of bodyBlocks(document).toArray()) {
            const carried: NodeRelationship[] = [];
            for (const id of referencedRelationshipIds(document, el)) {
                const rel = relationships.get(id);
                if (!rel) {
                    log.warn('dangling relationship reference', { filename: input.filename, id });
                    continue;
                }
                if (rel.external) {
                    carried.push({ ...rel });
                    continue;
                }
                const partName = resolveTarget(mainPartName, rel.target);
                const entry = zip.file(partName);
                if (!entry) {
                    log.warn('relationship target part missing', { filename: input.filename, id, part: partName });
                    continue;
                }
                carried.push({
                    ...rel,
                    part: {
                        name: partName,
                        data: await entry.async('nodebuffer'),
                        contentType: contentTypeOf(contentTypes, partName),
                    },
                });
            }

            blocks.push({
                kind: 'node',
                xml: document.xml(el),
                relationships: carried,
                namespaces,
            });
        }
        return blocks;
    }
}
