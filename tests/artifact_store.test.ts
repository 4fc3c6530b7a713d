import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import path from 'node:path';
import JSZip from 'jszip';

import { DocxArtifactStore } from '../src/artifact_store';
import { NodeBlock, ParagraphBlock } from '../src/content_blocks';
import { sha256Hex } from '../src/merge_journal';
import { StorageError } from '../src/structured_error';
import { configureLogging } from '../src/logger';
import { HYPERLINK_REL_TYPE, IMAGE_REL_TYPE, makeTempDir, outlineLines } from './helpers/docx_fixtures';

configureLogging({ level: 'error' });

const W_NS = 'http://schemas.openxmlformats.org/wordprocessingml/2006/main';
const R_NS = 'http://schemas.openxmlformats.org/officeDocument/2006/relationships';

function paragraph(text: string): ParagraphBlock {
    return { kind: 'paragraph', runs: [{ text }] };
}

async function zipEntry(file: string, name: string): Promise<string> {
    const zip = await JSZip.loadAsync(fs.readFileSync(file));
    return (await zip.file(name)?.async('string')) ?? '';
}

test('missing artifact opens as an empty document', async () => {
    const tmp = makeTempDir('artifact-');
    try {
        const store = new DocxArtifactStore();
        const handle = await store.openOrCreate(path.join(tmp, 'merged.docx'));
        assert.equal(handle.loadedFromDisk, false);
        assert.equal(store.hasContent(handle), false);
        assert.deepEqual(store.outline(handle), []);
        assert.equal(fs.existsSync(path.join(tmp, 'merged.docx')), false);
    } finally {
        fs.rmSync(tmp, { recursive: true, force: true });
    }
});

test('appended blocks persist in order ahead of the section properties', async () => {
    const tmp = makeTempDir('artifact-');
    try {
        const file = path.join(tmp, 'out', 'merged.docx');
        const store = new DocxArtifactStore();
        const handle = await store.openOrCreate(file);

        store.appendContent(handle, [{ kind: 'paragraph', runs: [{ text: 'Hello', bold: true }] }]);
        assert.equal(store.hasContent(handle), true);
        store.appendSeparator(handle);
        store.appendContent(handle, [
            {
                kind: 'table',
                rows: [[[paragraph('r1c1')], [paragraph('r1c2')]], [[paragraph('r2c1')], []]],
            },
            paragraph('a\tb\nc'),
        ]);
        const rendered = await store.persist(handle);

        assert.equal(sha256Hex(fs.readFileSync(file)), rendered.sha256);
        assert.deepEqual(await outlineLines(file), ['Hello', '[sep]', '[table] r1c1\tr1c2\nr2c1\t', 'a\tb\nc']);

        const xml = await zipEntry(file, 'word/document.xml');
        assert.match(xml, /<\/w:sectPr><\/w:body><\/w:document>$/);
        assert.ok(xml.includes('<w:r><w:rPr><w:b/></w:rPr><w:t xml:space="preserve">Hello</w:t></w:r>'));

        const reopened = await store.openOrCreate(file);
        assert.equal(reopened.loadedFromDisk, true);
        assert.equal(store.hasContent(reopened), true);
    } finally {
        fs.rmSync(tmp, { recursive: true, force: true });
    }
});

test('corrupt artifact raises StorageError', async () => {
    const tmp = makeTempDir('artifact-');
    try {
        const file = path.join(tmp, 'merged.docx');
        fs.writeFileSync(file, 'this is not a zip');
        await assert.rejects(new DocxArtifactStore().openOrCreate(file), StorageError);
    } finally {
        fs.rmSync(tmp, { recursive: true, force: true });
    }
});

test('spliced nodes bring their image parts and hyperlinks along', async () => {
    const tmp = makeTempDir('artifact-');
    try {
        const file = path.join(tmp, 'merged.docx');
        const store = new DocxArtifactStore();
        const handle = await store.openOrCreate(file);

        const imageNode = (): NodeBlock => ({
            kind: 'node',
            xml: '<w:p><w:r><w:drawing><a:blip r:embed="rId7"/></w:drawing></w:r></w:p>',
            relationships: [
                {
                    id: 'rId7',
                    type: IMAGE_REL_TYPE,
                    target: 'media/image1.png',
                    external: false,
                    part: { name: 'word/media/image1.png', data: Buffer.from('png-bytes'), contentType: 'image/png' },
                },
            ],
            namespaces: { w: W_NS, r: R_NS },
        });
        const linkNode: NodeBlock = {
            kind: 'node',
            xml: '<w:p><w:hyperlink r:id="rId3"><w:r><w:t>site</w:t></w:r></w:hyperlink></w:p>',
            relationships: [{ id: 'rId3', type: HYPERLINK_REL_TYPE, target: 'https://example.com/', external: true }],
            namespaces: { w: W_NS, r: R_NS, w14: 'http://schemas.microsoft.com/office/word/2010/wordml' },
        };

        store.appendContent(handle, [imageNode(), imageNode(), linkNode]);
        await store.persist(handle);

        const zip = await JSZip.loadAsync(fs.readFileSync(file));
        assert.equal(await zip.file('word/media/merged1-image1.png')?.async('string'), 'png-bytes');
        assert.equal(await zip.file('word/media/merged2-image1.png')?.async('string'), 'png-bytes');

        const rels = await zipEntry(file, 'word/_rels/document.xml.rels');
        assert.ok(rels.includes(`<Relationship Id="rId1" Type="${IMAGE_REL_TYPE}" Target="media/merged1-image1.png"/>`));
        assert.ok(rels.includes(`<Relationship Id="rId2" Type="${IMAGE_REL_TYPE}" Target="media/merged2-image1.png"/>`));
        assert.ok(
            rels.includes(
                `<Relationship Id="rId3" Type="${HYPERLINK_REL_TYPE}" Target="https://example.com/" TargetMode="External"/>`
            )
        );

        const types = await zipEntry(file, '[Content_Types].xml');
        assert.ok(types.includes('<Override PartName="/word/media/merged1-image1.png" ContentType="image/png"/>'));

        const xml = await zipEntry(file, 'word/document.xml');
        assert.ok(xml.includes('<a:blip r:embed="rId1"/>'));
        assert.ok(xml.includes('<a:blip r:embed="rId2"/>'));
        assert.ok(xml.includes('<w:hyperlink r:id="rId3">'));
        assert.ok(xml.includes('xmlns:w14="http://schemas.microsoft.com/office/word/2010/wordml"'));
    } finally {
        fs.rmSync(tmp, { recursive: true, force: true });
    }
});
