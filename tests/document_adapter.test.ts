import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import path from 'node:path';
import JSZip from 'jszip';

import {
    NodeSplicingAdapter,
    StructuralCopyAdapter,
    createDocumentAdapter,
    isAdapterStrategy,
} from '../src/document_adapter';
import { DocumentReadError } from '../src/structured_error';
import { configureLogging } from '../src/logger';
import { HYPERLINK_REL_TYPE, IMAGE_REL_TYPE, makeTempDir, para, writeDocx } from './helpers/docx_fixtures';

configureLogging({ level: 'error' });

test('strategy names resolve to adapters', () => {
    assert.equal(createDocumentAdapter('structural-copy').strategy, 'structural-copy');
    assert.equal(createDocumentAdapter('node-splicing').strategy, 'node-splicing');
    assert.equal(isAdapterStrategy('node-splicing'), true);
    assert.equal(isAdapterStrategy('copy'), false);
});

test('structural copy keeps text, run formatting and tables', async () => {
    const tmp = makeTempDir('adapter-');
    try {
        const body =
            '<w:p>' +
            '<w:r><w:rPr><w:rFonts w:ascii="Arial"/><w:b/><w:i w:val="0"/><w:sz w:val="28"/><w:u w:val="single"/></w:rPr><w:t>Bold</w:t></w:r>' +
            '<w:hyperlink r:id="rId9"><w:r><w:t>link</w:t></w:r></w:hyperlink>' +
            '</w:p>' +
            '<w:tbl><w:tr><w:tc><w:p><w:r><w:t>x</w:t></w:r></w:p></w:tc></w:tr></w:tbl>' +
            '<w:bookmarkStart w:id="0" w:name="skipped"/>' +
            '<w:p><w:r><w:t>a</w:t><w:tab/><w:t>b</w:t><w:br/><w:t>c</w:t><w:br w:type="page"/></w:r></w:p>';
        const file = await writeDocx(tmp, 'in.docx', body);

        const blocks = await new StructuralCopyAdapter().extract({ filename: 'in.docx', path: file });
        assert.deepEqual(blocks, [
            {
                kind: 'paragraph',
                runs: [
                    { text: 'Bold', bold: true, italic: false, underline: 'single', fontName: 'Arial', sizeHalfPoints: 28 },
                    { text: 'link' },
                ],
            },
            { kind: 'table', rows: [[[{ kind: 'paragraph', runs: [{ text: 'x' }] }]]] },
            { kind: 'paragraph', runs: [{ text: 'a\tb\nc' }] },
        ]);
    } finally {
        fs.rmSync(tmp, { recursive: true, force: true });
    }
});

test('node splicing carries body nodes verbatim with their relationships', async () => {
    const tmp = makeTempDir('adapter-');
    try {
        const file = await writeDocx(tmp, 'in.docx', {
            body:
                para('one') +
                '<w:p><w:r><w:drawing><a:blip xmlns:a="http://schemas.openxmlformats.org/drawingml/2006/main" r:embed="rId5"/></w:drawing></w:r></w:p>' +
                '<w:p><w:hyperlink r:id="rId6"><w:r><w:t>x</w:t></w:r></w:hyperlink></w:p>' +
                '<w:p><w:hyperlink r:id="rId99"><w:r><w:t>gone</w:t></w:r></w:hyperlink></w:p>',
            relationships: [
                { id: 'rId5', type: IMAGE_REL_TYPE, target: 'media/image1.png' },
                { id: 'rId6', type: HYPERLINK_REL_TYPE, target: 'https://example.com/', external: true },
            ],
            parts: { 'word/media/image1.png': Buffer.from('img') },
        });

        const blocks = await new NodeSplicingAdapter().extract({ filename: 'in.docx', path: file });
        assert.equal(blocks.length, 4);

        const [first, image, link, dangling] = blocks;
        assert.equal(first.kind, 'node');
        if (first.kind !== 'node' || image.kind !== 'node' || link.kind !== 'node' || dangling.kind !== 'node') return;

        assert.equal(first.xml, '<w:p><w:r><w:t xml:space="preserve">one</w:t></w:r></w:p>');
        assert.deepEqual(first.relationships, []);
        assert.deepEqual(first.namespaces, {
            w: 'http://schemas.openxmlformats.org/wordprocessingml/2006/main',
            r: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships',
        });

        assert.equal(image.relationships.length, 1);
        const rel = image.relationships[0];
        assert.equal(rel.id, 'rId5');
        assert.equal(rel.external, false);
        assert.equal(rel.part?.name, 'word/media/image1.png');
        assert.equal(rel.part?.data.toString(), 'img');
        assert.equal(rel.part?.contentType, 'image/png');

        assert.deepEqual(link.relationships, [
            { id: 'rId6', type: HYPERLINK_REL_TYPE, target: 'https://example.com/', external: true },
        ]);
        assert.deepEqual(dangling.relationships, []);
    } finally {
        fs.rmSync(tmp, { recursive: true, force: true });
    }
});

test('unreadable inputs raise DocumentReadError', async () => {
    const tmp = makeTempDir('adapter-');
    try {
        const notZip = path.join(tmp, 'bad.docx');
        fs.writeFileSync(notZip, 'plain text with a docx name');

        const noBody = path.join(tmp, 'nobody.docx');
        const zip = new JSZip();
        zip.file('word/document.xml', '<w:document xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main"/>');
        fs.writeFileSync(noBody, await zip.generateAsync({ type: 'nodebuffer' }));

        for (const adapter of [new StructuralCopyAdapter(), new NodeSplicingAdapter()]) {
            await assert.rejects(adapter.extract({ filename: 'bad.docx', path: notZip }), DocumentReadError);
            await assert.rejects(adapter.extract({ filename: 'nobody.docx', path: noBody }), DocumentReadError);
            await assert.rejects(
                adapter.extract({ filename: 'missing.docx', path: path.join(tmp, 'missing.docx') }),
                DocumentReadError
            );
        }
    } finally {
        fs.rmSync(tmp, { recursive: true, force: true });
    }
});
