/**
 * Content blocks - the neutral unit moved from an input document into the
 * artifact, and their WordprocessingML rendering.
 */

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export interface TextRun {
    /** Plain text; '\t' renders as a tab, '\n' as a line break. */
    text: string;
    bold?: boolean;
    italic?: boolean;
    /** WordprocessingML underline style, e.g. 'single', 'double'. */
    underline?: string;
    fontName?: string;
    /** Font size in half-points (w:sz), e.g. 24 for 12pt. */
    sizeHalfPoints?: number;
}

export interface ParagraphBlock {
    kind: 'paragraph';
    runs: TextRun[];
}

export interface TableBlock {
    kind: 'table';
    /** rows -> cells -> paragraphs */
    rows: ParagraphBlock[][][];
}

export interface BreakBlock {
    kind: 'break';
}

/** A relationship the spliced XML refers to through an r:* attribute. */
export interface NodeRelationship {
    id: string;
    type: string;
    target: string;
    external: boolean;
    /** Bytes and content type of the internal part the relationship targets. */
    part?: { name: string; data: Buffer; contentType: string | null };
}

/** A body-level node copied verbatim from the source package. */
export interface NodeBlock {
    kind: 'node';
    xml: string;
    relationships: NodeRelationship[];
    /** Namespace declarations (prefix -> uri) of the source document root. */
    namespaces: Record<string, string>;
}

export type ContentBlock = ParagraphBlock | TableBlock | BreakBlock | NodeBlock;

/* -------------------------------------------------------------------------- */
/* Rendering                                                                  */
/* -------------------------------------------------------------------------- */

export function escapeXml(value: string): string {
    return value
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;');
}

function renderToggle(tag: string, value: boolean | undefined): string {
    if (value === undefined) return '';
    return value ? `<${tag}/>` : `<${tag} w:val="0"/>`;
}

function renderRunProperties(run: TextRun): string {
    // element order follows CT_RPr
    let props = '';
    if (run.fontName) {
        const f = escapeXml(run.fontName);
        props += `<w:rFonts w:ascii="${f}" w:hAnsi="${f}" w:cs="${f}"/>`;
    }
    props += renderToggle('w:b', run.bold);
    props += renderToggle('w:i', run.italic);
    if (run.sizeHalfPoints !== undefined) {
        props += `<w:sz w:val="${run.sizeHalfPoints}"/><w:szCs w:val="${run.sizeHalfPoints}"/>`;
    }
    if (run.underline) props += `<w:u w:val="${escapeXml(run.underline)}"/>`;
    return props ? `<w:rPr>${props}</w:rPr>` : '';
}

function renderRunContent(text: string): string {
    let out = '';
    for (const piece of text.split(/(\t|\n)/)) {
        if (piece === '\t') out += '<w:tab/>';
        else if (piece === '\n') out += '<w:br/>';
        else if (piece) out += `<w:t xml:space="preserve">${escapeXml(piece)}</w:t>`;
    }
    return out;
}

export function renderRun(run: TextRun): string {
    return `<w:r>${renderRunProperties(run)}${renderRunContent(run.text)}</w:r>`;
}

export function renderParagraph(p: ParagraphBlock): string {
    return `<w:p>${p.runs.map(renderRun).join('')}</w:p>`;
}

export function renderPageBreak(): string {
    return '<w:p><w:r><w:br w:type="page"/></w:r></w:p>';
}

const TABLE_BORDERS = ['top', 'left', 'bottom', 'right', 'insideH', 'insideV']
    .map((side) => `<w:${side} w:val="single" w:sz="4" w:space="0" w:color="auto"/>`)
    .join('');

export function renderTable(t: TableBlock): string {
    const columns = t.rows.reduce((max, row) => Math.max(max, row.length), 0);
    const grid = '<w:gridCol/>'.repeat(columns);
    const rows = t.rows.map((row) => {
        const cells = row.map((paragraphs) => {
            // a cell must end in a paragraph
            const body = paragraphs.length > 0 ? paragraphs.map(renderParagraph).join('') : '<w:p/>';
            return `<w:tc><w:tcPr><w:tcW w:w="0" w:type="auto"/></w:tcPr>${body}</w:tc>`;
        });
        return `<w:tr>${cells.join('')}</w:tr>`;
    });
    return (
        `<w:tbl><w:tblPr><w:tblW w:w="0" w:type="auto"/><w:tblBorders>${TABLE_BORDERS}</w:tblBorders></w:tblPr>` +
        `<w:tblGrid>${grid}</w:tblGrid>${rows.join('')}</w:tbl>`
    );
}

/** Markup for blocks that need no package context. */
export function renderStructuralBlock(block: ParagraphBlock | TableBlock | BreakBlock): string {
    switch (block.kind) {
        case 'paragraph': return renderParagraph(block);
        case 'table': return renderTable(block);
        case 'break': return renderPageBreak();
    }
}
