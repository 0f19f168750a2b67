import * as fs from 'fs/promises';
import * as path from 'path';
import { ServiceContainer } from '../services/index.js';
import { resolveFormats } from '../services/exportService.js';
import { buildPandocArgs } from '../services/pandocConverter.js';
import { ConversionJob, ConversionResult } from '../types/export.js';
import { ExportError, InputError } from '../utils/errorHandler.js';
import { FakeConverter } from './helpers/fakeConverter.js';
import { ScriptedBackend } from './helpers/stubBackend.js';
import { makeTempDir, removeDir, testServices, testSettings, writeFile } from './helpers/testProject.js';

const pdfSettings = { engine: 'xelatex', fontSize: 12, margin: '1in' };

describe('buildPandocArgs', () => {
    it('builds a PDF invocation', () => {
        expect(buildPandocArgs(['c1.md', 'c2.md'], 'out.pdf', 'pdf', {
            metadata: { title: 'Salt', author: 'Test Author' },
            toc: true,
            pdf: pdfSettings
        })).toEqual([
            'c1.md', 'c2.md',
            '--from', 'markdown',
            '--metadata', 'title=Salt',
            '--metadata', 'author=Test Author',
            '--toc', '--toc-depth=2',
            '--pdf-engine=xelatex',
            '-V', 'fontsize=12pt',
            '-V', 'geometry:margin=1in',
            '-o', 'out.pdf'
        ]);
    });

    it('adds the cover only to EPUB and skips the TOC when disabled', () => {
        const options = { metadata: { title: 'Salt', author: 'A' }, toc: false, coverImage: 'cover.jpg', pdf: pdfSettings };
        expect(buildPandocArgs(['c1.md'], 'out.epub', 'epub', options)).toContain('--epub-cover-image=cover.jpg');
        const docx = buildPandocArgs(['c1.md'], 'out.docx', 'docx', options);
        expect(docx).not.toContain('--epub-cover-image=cover.jpg');
        expect(docx).not.toContain('--toc');
    });
});

describe('resolveFormats', () => {
    it('expands all to the configured formats', () => {
        expect(resolveFormats(['all'], ['epub', 'pdf'])).toEqual(['epub', 'pdf']);
        expect(resolveFormats([], ['docx'])).toEqual(['docx']);
    });

    it('collapses duplicates and rejects unknown formats', () => {
        expect(resolveFormats(['HTML', 'html', 'epub'], ['pdf'])).toEqual(['html', 'epub']);
        expect(() => resolveFormats(['mobi'], ['pdf'])).toThrow(InputError);
    });
});

describe('ExportService', () => {
    let dir: string;
    let converter: FakeConverter;
    let services: ServiceContainer;

    const chaptersDir = () => services.layout.chaptersDir('Novel');
    const exportsDir = () => services.layout.exportsDir('Novel');

    beforeEach(async () => {
        dir = await makeTempDir();
        converter = new FakeConverter();
        services = testServices(testSettings(dir), { backend: new ScriptedBackend(), converter });
        await writeFile(path.join(chaptersDir(), 'chapter_01_v1.md'), '# Chapter 1\n\nOld.\n');
        await writeFile(path.join(chaptersDir(), 'chapter_01_v2.md'), '# Chapter 1\n\nNew.\n');
        await writeFile(path.join(chaptersDir(), 'chapter_01_raw_v1.md'), '# Chapter 1\n\nRaw.\n');
        await writeFile(path.join(chaptersDir(), 'chapter_10_v1.md'), '# Chapter 10\n\nTen.\n');
        await writeFile(path.join(chaptersDir(), 'chapter_02_v1.md'), '# Chapter 2\n\nTwo.\n');
    });

    afterEach(async () => {
        await removeDir(dir);
    });

    it('converts the latest chapters in chapter order to every configured format', async () => {
        const outcomes = await services.exporter.exportBook('Novel', { formats: ['all'] });

        expect(outcomes).toEqual([
            { format: 'epub', path: path.join(exportsDir(), 'Novel_v1.epub') },
            { format: 'pdf', path: path.join(exportsDir(), 'Novel_v1.pdf') }
        ]);
        expect(converter.jobs[0].inputs).toEqual([
            path.join(chaptersDir(), 'chapter_01_v2.md'),
            path.join(chaptersDir(), 'chapter_02_v1.md'),
            path.join(chaptersDir(), 'chapter_10_v1.md')
        ]);
        expect(await fs.readFile(outcomes[0].path, 'utf-8')).toBe('# Chapter 1\n\nNew.\n\n# Chapter 2\n\nTwo.\n\n# Chapter 10\n\nTen.\n');
        expect((await fs.readdir(exportsDir())).sort()).toEqual(['Novel_v1.epub', 'Novel_v1.pdf']);
    });

    it('defaults the title to the book name and lets the request override metadata', async () => {
        await services.exporter.exportBook('Novel', { formats: ['html'] });
        expect(converter.jobs[0].args).toEqual(expect.arrayContaining(['title=Novel', 'author=Test Author']));

        await services.exporter.exportBook('Novel', { formats: ['html'], title: 'The Salt Road', author: 'Someone Else' });
        expect(converter.jobs[1].args).toEqual(expect.arrayContaining(['title=The Salt Road', 'author=Someone Else']));
    });

    it('uses the cover image for EPUB when present', async () => {
        const cover = await writeFile(path.join(exportsDir(), 'cover.jpg'), 'jpeg');
        await services.exporter.exportBook('Novel', { formats: ['epub'] });
        expect(converter.jobs[0].args).toContain(`--epub-cover-image=${cover}`);
    });

    it('writes a new version on every export', async () => {
        await services.exporter.exportBook('Novel', { formats: ['docx'] });
        const [second] = await services.exporter.exportBook('Novel', { formats: ['docx'] });
        expect(path.basename(second.path)).toBe('Novel_v2.docx');
    });

    it('maps a nonzero exit status to ExportError and removes the partial output', async () => {
        converter.exitCode = 43;
        await expect(services.exporter.exportBook('Novel', { formats: ['pdf'] }))
            .rejects.toThrow('pandoc exited with status 43 for pdf: conversion failed');
        expect(await fs.readdir(exportsDir())).toEqual([]);
    });

    it('maps a converter that cannot start to ExportError', async () => {
        const failing = {
            convert: async (_job: ConversionJob): Promise<ConversionResult> => {
                throw new Error('spawn pandoc ENOENT');
            },
            isAvailable: async () => false
        };
        const broken = testServices(testSettings(dir), { backend: new ScriptedBackend(), converter: failing });
        await expect(broken.exporter.exportBook('Novel', { formats: ['epub'] }))
            .rejects.toThrow(new ExportError('Export to epub failed: spawn pandoc ENOENT'));
    });

    it('fails when the book has no assembled chapters', async () => {
        await expect(services.exporter.exportBook('Empty Book')).rejects.toThrow(ExportError);
    });
});
