import fs from 'fs';
import path from 'path';
import request from 'supertest';
import { parseFrameContent } from '../../../src/presentation/routes/frameRoutes';
import { BadRequestError } from '../../../src/presentation/middleware/errorHandler';
import { createTestFrameApp, TestFrameApp } from '../../helpers/frameApp';
import { createTempTree, removeTempTree } from '../../helpers/tempDir';

describe('Frame routes', () => {
    let root: string;
    let harness: TestFrameApp;

    beforeEach(() => {
        root = createTempTree('frame-routes-');
        harness = createTestFrameApp(root);
        jest.spyOn(console, 'log').mockImplementation(() => { });
        jest.spyOn(console, 'warn').mockImplementation(() => { });
        jest.spyOn(console, 'error').mockImplementation(() => { });
    });

    afterEach(() => {
        removeTempTree(root);
        jest.restoreAllMocks();
    });

    describe('POST /api/frame/render', () => {
        it('should render with the default template', async () => {
            const response = await request(harness.app)
                .post('/api/frame/render')
                .send({ title: 'Hello', text: 'World', ext: { content_author: 'Ada', show_author: false } })
                .expect(200);

            expect(response.body).toEqual({
                success: true,
                message: 'Success',
                framePath: expect.stringMatching(/frame_[0-9a-f]{16}\.png$/),
                width: 1080,
                height: 1920,
            });
            expect(harness.surfaces.captured[0]).toContain('<div class="author" data-visible="false">Ada</div>');
        });

        it('should honour an explicit template', async () => {
            const response = await request(harness.app)
                .post('/api/frame/render')
                .send({ template: '1920x1080/default.html', text: 'Wide' })
                .expect(200);

            expect(path.dirname(response.body.framePath)).toBe(path.join(root, 'output'));
            expect(response.body.width).toBe(1920);
            expect(response.body.height).toBe(1080);
        });

        it('should refuse a caller-chosen output path', async () => {
            const outputPath = path.join(root, 'elsewhere', 'frame.png');

            const response = await request(harness.app)
                .post('/api/frame/render')
                .send({ text: 'x', outputPath })
                .expect(400);

            expect(response.body).toEqual({
                error: { message: 'body.outputPath is not accepted', code: 'BadRequestError' },
            });
            expect(fs.existsSync(outputPath)).toBe(false);
            expect(harness.surfaces.factory).not.toHaveBeenCalled();
        });

        it('should not load arbitrary files as templates', async () => {
            const secretPath = path.join(root, 'secret.txt');
            fs.writeFileSync(secretPath, 'placeholder-secret');

            const response = await request(harness.app)
                .post('/api/frame/render')
                .send({ template: secretPath, text: 'x' })
                .expect(404);

            expect(response.body.error.code).toBe('TemplateNotFoundError');
            expect(harness.surfaces.captured).toEqual([]);
        });

        it('should reject a missing text field', async () => {
            const response = await request(harness.app)
                .post('/api/frame/render')
                .send({ title: 'No body' })
                .expect(400);

            expect(response.body).toEqual({
                error: { message: 'body.text is required and must be a string', code: 'BadRequestError' },
            });
        });

        it('should reject an empty template key', async () => {
            const response = await request(harness.app)
                .post('/api/frame/render')
                .send({ template: '  ', text: 'x' })
                .expect(400);

            expect(response.body.error.message).toBe('template must be a non-empty string');
        });

        it('should return 404 for unknown templates', async () => {
            const response = await request(harness.app)
                .post('/api/frame/render')
                .send({ template: 'nope.html', text: 'x' })
                .expect(404);

            expect(response.body).toEqual({
                error: { message: 'Template not found: nope.html', code: 'TemplateNotFoundError' },
            });
        });

        it('should return 500 when rendering fails', async () => {
            harness.surfaces.factory.mockRejectedValueOnce(new Error('browser crashed'));

            const response = await request(harness.app)
                .post('/api/frame/render')
                .send({ text: 'x' })
                .expect(500);

            expect(response.body).toEqual({
                error: { message: 'HTML rendering failed: browser crashed', code: 'FrameRenderError' },
            });
        });
    });

    describe('POST /api/frame/render-batch', () => {
        it('should render every frame in order', async () => {
            const response = await request(harness.app)
                .post('/api/frame/render-batch')
                .send({ template: '1920x1080/default.html', frames: [{ text: 'one' }, { text: 'two' }] })
                .expect(200);

            expect(response.body.success).toBe(true);
            expect(response.body.frames).toHaveLength(2);
            expect(response.body.frames[0]).toEqual({
                framePath: expect.stringMatching(/frame_[0-9a-f]{16}\.png$/),
                width: 1920,
                height: 1080,
            });
            expect(harness.surfaces.factory).toHaveBeenCalledTimes(1);
        });

        it('should reject an empty batch', async () => {
            const response = await request(harness.app)
                .post('/api/frame/render-batch')
                .send({ frames: [] })
                .expect(400);

            expect(response.body.error.message).toBe('frames is required and must be a non-empty array');
        });

        it('should point at the invalid frame', async () => {
            const response = await request(harness.app)
                .post('/api/frame/render-batch')
                .send({ frames: [{ text: 'ok' }, { text: 'bad', ext: { nested: { deep: true } } }] })
                .expect(400);

            expect(response.body.error.message).toBe('frames[1].ext.nested must be a string, number, boolean or null');
            expect(harness.surfaces.factory).not.toHaveBeenCalled();
        });
    });

    describe('GET /health', () => {
        it('should report status and version', async () => {
            const response = await request(harness.app).get('/health').expect(200);

            expect(response.body).toEqual({
                status: 'ok',
                timestamp: expect.any(String),
                version: '1.0.0',
            });
        });
    });
});

describe('parseFrameContent', () => {
    it('should treat null optional fields as absent', () => {
        expect(parseFrameContent({ text: 'x', title: null, image: null, ext: null }, 'body')).toEqual({
            text: 'x',
            title: undefined,
            image: undefined,
            ext: undefined,
        });
    });

    it('should keep scalar ext values', () => {
        expect(parseFrameContent({ text: 'x', ext: { a: 'b', n: 2, flag: true, none: null } }, 'body').ext)
            .toEqual({ a: 'b', n: 2, flag: true, none: null });
    });

    it('should reject non-object input', () => {
        expect(() => parseFrameContent('text', 'frames[0]')).toThrow(BadRequestError);
        expect(() => parseFrameContent('text', 'frames[0]')).toThrow('frames[0] must be an object');
    });

    it('should reject an output path in batch frames', () => {
        expect(() => parseFrameContent({ text: 'x', outputPath: 'out.png' }, 'frames[2]'))
            .toThrow('frames[2].outputPath is not accepted');
    });

    it('should keep __proto__ in ext as an own key', () => {
        const content = parseFrameContent(JSON.parse('{"text":"x","ext":{"__proto__":"kept"}}'), 'body');

        expect(content.ext && Object.keys(content.ext)).toEqual(['__proto__']);
        expect(content.ext && Object.getPrototypeOf(content.ext)).toBe(Object.prototype);
    });

    it('should reject a non-string image', () => {
        expect(() => parseFrameContent({ text: 'x', image: 42 }, 'body')).toThrow('body.image must be a string');
    });
});
