/**
 * DOCX package access - the OPC zip container and its WordprocessingML parts.
 *
 * Parts are held as cheerio documents in XML mode so they can be edited in
 * place and serialised back without losing unknown markup.
 */

import * as path from 'path';
import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import JSZip from 'jszip';

/* -------------------------------------------------------------------------- */
/* Constants                                                                  */
/* -------------------------------------------------------------------------- */

export const NS = {
    w: 'http://schemas.openxmlformats.org/wordprocessingml/2006/main',
    r: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships',
    wp: 'http://schemas.openxmlformats.org/drawingml/2006/wordprocessingDrawing',
    a: 'http://schemas.openxmlformats.org/drawingml/2006/main',
    pic: 'http://schemas.openxmlformats.org/drawingml/2006/picture',
    mc: 'http://schemas.openxmlformats.org/markup-compatibility/2006',
    contentTypes: 'http://schemas.openxmlformats.org/package/2006/content-types',
    packageRels: 'http://schemas.openxmlformats.org/package/2006/relationships',
} as const;

export const REL_TYPE_OFFICE_DOCUMENT =
    'http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument';

const MAIN_CONTENT_TYPE = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml';
const XML_DECL = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n';

const CONTENT_TYPES_PART = '[Content_Types].xml';
const ROOT_RELS_PART = '_rels/.rels';
const DEFAULT_MAIN_PART = 'word/document.xml';

const EMPTY_DOCUMENT =
    XML_DECL +
    `<w:document xmlns:w="${NS.w}" xmlns:r="${NS.r}" xmlns:wp="${NS.wp}" xmlns:a="${NS.a}" xmlns:pic="${NS.pic}">` +
    '<w:body><w:sectPr>' +
    '<w:pgSz w:w="12240" w:h="15840"/>' +
    '<w:pgMar w:top="1440" w:right="1440" w:bottom="1440" w:left="1440" w:header="720" w:footer="720" w:gutter="0"/>' +
    '</w:sectPr></w:body></w:document>';

const EMPTY_CONTENT_TYPES =
    XML_DECL +
    `<Types xmlns="${NS.contentTypes}">` +
    '<Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/>' +
    '<Default Extension="xml" ContentType="application/xml"/>' +
    `<Override PartName="/${DEFAULT_MAIN_PART}" ContentType="${MAIN_CONTENT_TYPE}"/>` +
    '</Types>';

const EMPTY_ROOT_RELS =
    XML_DECL +
    `<Relationships xmlns="${NS.packageRels}">` +
    `<Relationship Id="rId1" Type="${REL_TYPE_OFFICE_DOCUMENT}" Target="${DEFAULT_MAIN_PART}"/>` +
    '</Relationships>';

const EMPTY_RELS = XML_DECL + `<Relationships xmlns="${NS.packageRels}"></Relationships>`;

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export interface Relationship {
    id: string;
    type: string;
    target: string;
    external: boolean;
}

export interface DocxPackage {
    zip: JSZip;
    /** Zip entry name of the main document part, e.g. 'word/document.xml'. */
    mainPartName: string;
    document: CheerioAPI;
}

/* -------------------------------------------------------------------------- */
/* XML helpers                                                                */
/* -------------------------------------------------------------------------- */

export function loadXml(xml: string): CheerioAPI {
    return cheerio.load(xml, { xml: true });
}

export function bodyOf(document: CheerioAPI): Cheerio<Element> {
    return document('w\\:body').first();
}

/** Body-level elements other than the trailing section properties. */
export function bodyBlocks(document: CheerioAPI): Cheerio<Element> {
    return bodyOf(document).children().filter((_, el) => el.name !== 'w:sectPr');
}

/** Element children of `el` with the given qualified tag name. */
export function childrenNamed(document: CheerioAPI, el: Element, name: string): Element[] {
    return document(el).children().toArray().filter((c) => c.name === name);
}

export function rootNamespaces(document: CheerioAPI): Record<string, string> {
    const root = document.root().children().first().get(0);
    const out: Record<string, string> = {};
    if (!root) return out;
    for (const [name, value] of Object.entries(root.attribs)) {
        if (name.startsWith('xmlns:')) out[name.slice('xmlns:'.length)] = value;
    }
    return out;
}

/* -------------------------------------------------------------------------- */
/* Part naming                                                                */
/* -------------------------------------------------------------------------- */

/** 'word/document.xml' -> 'word/_rels/document.xml.rels' */
export function relsPartName(partName: string): string {
    const dir = path.posix.dirname(partName);
    const base = path.posix.basename(partName);
    return dir === '.' ? `_rels/${base}.rels` : `${dir}/_rels/${base}.rels`;
}

/** Resolve a relationship target against the part that owns the relationship. */
export function resolveTarget(sourcePart: string, target: string): string {
    if (target.startsWith('/')) return path.posix.normalize(target.slice(1));
    return path.posix.normalize(path.posix.join(path.posix.dirname(sourcePart), target));
}

/* -------------------------------------------------------------------------- */
/* Package access                                                             */
/* -------------------------------------------------------------------------- */

export async function readPart(zip: JSZip, name: string): Promise<string | null> {
    const entry = zip.file(name);
    return entry ? entry.async('string') : null;
}

export async function readRelationships(zip: JSZip, partName: string): Promise<Relationship[]> {
    const xml = await readPart(zip, relsPartName(partName));
    if (xml === null) return [];
    const $ = loadXml(xml);
    return $('Relationship').toArray().map((el) => ({
        id: el.attribs.Id ?? '',
        type: el.attribs.Type ?? '',
        target: el.attribs.Target ?? '',
        external: el.attribs.TargetMode === 'External',
    }));
}

async function findMainPart(zip: JSZip): Promise<string> {
    const rels = await readRelationships(zip, '');
    const main = rels.find((r) => r.type === REL_TYPE_OFFICE_DOCUMENT);
    return main ? resolveTarget('', main.target) : DEFAULT_MAIN_PART;
}

/**
 * Open a .docx from bytes. Throws a plain Error describing what is wrong;
 * callers wrap it in the error type of their layer.
 */
export async function readDocxPackage(data: Buffer): Promise<DocxPackage> {
    const zip = await JSZip.loadAsync(data);
    const mainPartName = await findMainPart(zip);
    const xml = await readPart(zip, mainPartName);
    if (xml === null) {
        throw new Error(`missing main document part ${mainPartName}`);
    }
    const document = loadXml(xml);
    if (bodyOf(document).length === 0) {
        throw new Error(`main document part ${mainPartName} has no w:body`);
    }
    return { zip, mainPartName, document };
}

export function createEmptyPackage(): DocxPackage {
    const zip = new JSZip();
    zip.file(CONTENT_TYPES_PART, EMPTY_CONTENT_TYPES);
    zip.file(ROOT_RELS_PART, EMPTY_ROOT_RELS);
    zip.file(relsPartName(DEFAULT_MAIN_PART), EMPTY_RELS);
    zip.file(DEFAULT_MAIN_PART, EMPTY_DOCUMENT);
    return { zip, mainPartName: DEFAULT_MAIN_PART, document: loadXml(EMPTY_DOCUMENT) };
}

export async function loadContentTypes(zip: JSZip): Promise<CheerioAPI> {
    return loadXml((await readPart(zip, CONTENT_TYPES_PART)) ?? EMPTY_CONTENT_TYPES);
}

export async function loadRelationshipsPart(zip: JSZip, partName: string): Promise<CheerioAPI> {
    return loadXml((await readPart(zip, relsPartName(partName))) ?? EMPTY_RELS);
}

/** Content type of a part: explicit Override first, then the extension Default. */
export function contentTypeOf(contentTypes: CheerioAPI, partName: string): string | null {
    const override = contentTypes('Override')
        .toArray()
        .find((el) => el.attribs.PartName === `/${partName}`);
    if (override?.attribs.ContentType) return override.attribs.ContentType;

    const ext = path.posix.extname(partName).slice(1).toLowerCase();
    const def = contentTypes('Default')
        .toArray()
        .find((el) => (el.attribs.Extension ?? '').toLowerCase() === ext);
    return def?.attribs.ContentType ?? null;
}

export function writeXmlPart(zip: JSZip, name: string, doc: CheerioAPI): void {
    zip.file(name, doc.xml());
}

export async function packageToBuffer(zip: JSZip): Promise<Buffer> {
    return zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
}

export { CONTENT_TYPES_PART };
