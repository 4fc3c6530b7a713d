// artifact_store.ts - cumulative output document
//
// GUARANTEES:
// - openOrCreate loads the last persisted artifact or starts an empty .docx
// - Blocks are appended in call order, always before the body's trailing w:sectPr
// - Spliced nodes keep their images/links: relationships are re-keyed and target parts copied
// - persist writes through temp file + fsync + rename (never a torn artifact)
//
// CONTRACT: one handle per pass, single writer

import * as fs from 'fs';
import * as path from 'path';
import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';

import {
    ContentBlock,
    NodeBlock,
    escapeXml,
    renderPageBreak,
    renderStructuralBlock,
} from './content_blocks';
import {
    CONTENT_TYPES_PART,
    DocxPackage,
    bodyBlocks,
    bodyOf,
    childrenNamed,
    createEmptyPackage,
    loadContentTypes,
    loadRelationshipsPart,
    loadXml,
    packageToBuffer,
    readDocxPackage,
    relsPartName,
    rootNamespaces,
    writeXmlPart,
} from './docx_package';
import { atomicWriteFileSync } from './durable';
import { sha256Hex } from './merge_journal';
import { StorageError, errnoCode, errorMessage } from './structured_error';
import { createLogger } from './logger';

const log = createLogger('artifact');

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export interface ArtifactHandle {
    readonly path: string;
    /** True when the handle was loaded from an existing file. */
    readonly loadedFromDisk: boolean;
    readonly pkg: DocxPackage;
    readonly relationships: CheerioAPI;
    readonly contentTypes: CheerioAPI;
}

export interface RenderedArtifact {
    bytes: Buffer;
    sha256: string;
}

export type OutlineKind = 'paragraph' | 'table' | 'separator' | 'other';

export interface OutlineEntry {
    kind: OutlineKind;
    text: string;
}

export interface ArtifactStore {
    openOrCreate(artifactPath: string): Promise<ArtifactHandle>;
    hasContent(handle: ArtifactHandle): boolean;
    appendSeparator(handle: ArtifactHandle): void;
    appendContent(handle: ArtifactHandle, blocks: ContentBlock[]): void;
    render(handle: ArtifactHandle): Promise<RenderedArtifact>;
    write(handle: ArtifactHandle, rendered: RenderedArtifact): void;
    persist(handle: ArtifactHandle): Promise<RenderedArtifact>;
    outline(handle: ArtifactHandle): OutlineEntry[];
}

/* -------------------------------------------------------------------------- */
/* Helpers                                                                    */
/* -------------------------------------------------------------------------- */

function insertBeforeSectPr(handle: ArtifactHandle, xml: string): void {
    const body = bodyOf(handle.pkg.document);
    const sectPr = body.children('w\\:sectPr').last();
    if (sectPr.length > 0) {
        sectPr.before(xml);
    } else {
        body.append(xml);
    }
}

function paragraphText(doc: CheerioAPI, p: Element): string {
    let text = '';
    doc(p).find('w\\:t, w\\:tab, w\\:br, w\\:cr').each((_, el) => {
        if (el.name === 'w:t') text += doc(el).text();
        else if (el.name === 'w:tab') text += '\t';
        else if (el.attribs['w:type'] !== 'page') text += '\n';
    });
    return text;
}

function isPageBreakOnly(doc: CheerioAPI, p: Element): boolean {
    const pageBreaks = doc(p).find('w\\:br').filter((_, br) => br.attribs['w:type'] === 'page');
    return pageBreaks.length > 0 && doc(p).find('w\\:t').text() === '';
}

function uniquePartName(handle: ArtifactHandle, wanted: string): string {
    const dir = path.posix.dirname(wanted);
    const base = path.posix.basename(wanted);
    for (let n = 1; ; n++) {
        const candidate = dir === '.' ? `merged${n}-${base}` : `${dir}/merged${n}-${base}`;
        if (!handle.pkg.zip.file(candidate)) return candidate;
    }
}

function nextRelationshipId(rels: CheerioAPI): string {
    const used = new Set(rels('Relationship').toArray().map((el) => el.attribs.Id));
    for (let n = used.size + 1; ; n++) {
        const id = `rId${n}`;
        if (!used.has(id)) return id;
    }
}

/* -------------------------------------------------------------------------- */
/* DOCX Artifact Store                                                        */
/* -------------------------------------------------------------------------- */

export class DocxArtifactStore implements ArtifactStore {
    async openOrCreate(artifactPath: string): Promise<ArtifactHandle> {
        let data: Buffer | null = null;
        try {
            data = fs.readFileSync(artifactPath);
        } catch (e) {
            if (errnoCode(e) !== 'ENOENT') {
                throw new StorageError(`Cannot read artifact ${artifactPath}`, { path: artifactPath }, e);
            }
        }

        let pkg: DocxPackage;
        if (data === null) {
            pkg = createEmptyPackage();
            log.info('created new artifact', { path: artifactPath });
        } else {
            try {
                pkg = await readDocxPackage(data);
            } catch (e) {
                throw new StorageError(
                    `Artifact ${artifactPath} is not a valid .docx document`,
                    { path: artifactPath, reason: errorMessage(e) },
                    e
                );
            }
            log.debug('loaded artifact', { path: artifactPath, bytes: data.length });
        }

        return {
            path: artifactPath,
            loadedFromDisk: data !== null,
            pkg,
            relationships: await loadRelationshipsPart(pkg.zip, pkg.mainPartName),
            contentTypes: await loadContentTypes(pkg.zip),
        };
    }

    hasContent(handle: ArtifactHandle): boolean {
        return bodyBlocks(handle.pkg.document).length > 0;
    }

    appendSeparator(handle: ArtifactHandle): void {
        insertBeforeSectPr(handle, renderPageBreak());
    }

    appendContent(handle: ArtifactHandle, blocks: ContentBlock[]): void {
        for (const block of blocks) {
            if (block.kind === 'node') {
                insertBeforeSectPr(handle, this.importNode(handle, block));
            } else {
                insertBeforeSectPr(handle, renderStructuralBlock(block));
            }
        }
    }

    async render(handle: ArtifactHandle): Promise<RenderedArtifact> {
        const { zip, mainPartName, document } = handle.pkg;
        writeXmlPart(zip, mainPartName, document);
        writeXmlPart(zip, relsPartName(mainPartName), handle.relationships);
        writeXmlPart(zip, CONTENT_TYPES_PART, handle.contentTypes);
        const bytes = await packageToBuffer(zip);
        return { bytes, sha256: sha256Hex(bytes) };
    }

    write(handle: ArtifactHandle, rendered: RenderedArtifact): void {
        const warnings: string[] = [];
        atomicWriteFileSync({ filePath: handle.path, content: rendered.bytes, fsyncMode: 'BEST_EFFORT', warnings });
        for (const w of warnings) log.warn('artifact write warning', { path: handle.path, warning: w });
    }

    async persist(handle: ArtifactHandle): Promise<RenderedArtifact> {
        const rendered = await this.render(handle);
        this.write(handle, rendered);
        return rendered;
    }

    outline(handle: ArtifactHandle): OutlineEntry[] {
        const doc = handle.pkg.document;
        return bodyBlocks(doc).toArray().map((el): OutlineEntry => {
            if (el.name === 'w:p') {
                if (isPageBreakOnly(doc, el)) return { kind: 'separator', text: '' };
                return { kind: 'paragraph', text: paragraphText(doc, el) };
            }
            if (el.name === 'w:tbl') {
                const rows = childrenNamed(doc, el, 'w:tr').map((tr) =>
                    childrenNamed(doc, tr, 'w:tc')
                        .map((tc) => childrenNamed(doc, tc, 'w:p').map((p) => paragraphText(doc, p)).join('\n'))
                        .join('\t')
                );
                return { kind: 'table', text: rows.join('\n') };
            }
            return { kind: 'other', text: doc(el).text() };
        });
    }

    /**
     * Bring a spliced node's relationships and namespace declarations into
     * the artifact and return its markup with r:* ids rewritten.
     */
    private importNode(handle: ArtifactHandle, block: NodeBlock): string {
        const root = handle.pkg.document.root().children().first();
        const declared = rootNamespaces(handle.pkg.document);
        for (const [prefix, uri] of Object.entries(block.namespaces)) {
            if (!(prefix in declared)) root.attr(`xmlns:${prefix}`, uri);
        }

        if (block.relationships.length === 0) return block.xml;

        const rels = handle.relationships;
        const relsRoot = rels('Relationships').first();
        const idMap = new Map<string, string>();

        for (const rel of block.relationships) {
            const newId = nextRelationshipId(rels);
            let target = rel.target;

            if (!rel.external && rel.part) {
                const partName = uniquePartName(handle, rel.part.name);
                handle.pkg.zip.file(partName, rel.part.data);
                if (rel.part.contentType) {
                    handle.contentTypes('Types').first().append(
                        `<Override PartName="/${escapeXml(partName)}" ContentType="${escapeXml(rel.part.contentType)}"/>`
                    );
                }
                target = path.posix.relative(path.posix.dirname(handle.pkg.mainPartName), partName);
            }

            const attrs = [`Id="${newId}"`, `Type="${escapeXml(rel.type)}"`, `Target="${escapeXml(target)}"`];
            if (rel.external) attrs.push('TargetMode="External"');
            relsRoot.append(`<Relationship ${attrs.join(' ')}/>`);
            idMap.set(rel.id, newId);
        }

        const fragment = loadXml(block.xml);
        fragment<Element, string>('*').each((_, el) => {
            for (const [name, value] of Object.entries(el.attribs)) {
                const mapped = idMap.get(value);
                if (name.startsWith('r:') && mapped !== undefined) fragment(el).attr(name, mapped);
            }
        });
        return fragment.xml();
    }
}
