import fs from 'fs';
import os from 'os';
import path from 'path';
import { pathToFileURL } from 'url';
import {
    classifyImageReference,
    normalizeImageReference,
} from '../../../src/domain/services/ImageReferenceNormalizer';

describe('ImageReferenceNormalizer', () => {
    let root: string;

    beforeEach(() => {
        root = fs.mkdtempSync(path.join(os.tmpdir(), 'frame-images-'));
        fs.mkdirSync(path.join(root, 'assets'));
        fs.writeFileSync(path.join(root, 'assets', 'pic.png'), 'not-really-a-png');
        jest.spyOn(console, 'warn').mockImplementation(() => { });
    });

    afterEach(() => {
        fs.rmSync(root, { recursive: true, force: true });
        jest.restoreAllMocks();
    });

    it('should classify references', () => {
        expect(classifyImageReference('https://cdn.example.com/a.png')).toBe('url');
        expect(classifyImageReference('http://localhost/a.png')).toBe('url');
        expect(classifyImageReference('data:image/png;base64,AAAA')).toBe('data-uri');
        expect(classifyImageReference('file:///tmp/a.png')).toBe('file-uri');
        expect(classifyImageReference('assets/a.png')).toBe('path');
        expect(classifyImageReference('')).toBe('empty');
    });

    it.each([
        'https://cdn.example.com/scene.png',
        'http://localhost:8000/scene.png',
        'data:image/png;base64,iVBORw0KGgo=',
        'file:///var/frames/scene.png',
    ])('should pass %s through unchanged', (image) => {
        expect(normalizeImageReference(image, { workingRoot: root })).toBe(image);
    });

    it('should turn a relative path into an absolute file URI', () => {
        const result = normalizeImageReference('assets/pic.png', { workingRoot: root });

        expect(result).toBe(pathToFileURL(path.join(root, 'assets', 'pic.png')).href);
        expect(result.startsWith('file://')).toBe(true);
        expect(console.warn).not.toHaveBeenCalled();
    });

    it('should turn an absolute path into a file URI', () => {
        const absolute = path.join(root, 'assets', 'pic.png');
        expect(normalizeImageReference(absolute, { workingRoot: '/elsewhere' })).toBe(pathToFileURL(absolute).href);
    });

    it('should warn but still rewrite a missing file', () => {
        const result = normalizeImageReference('assets/missing.png', { workingRoot: root });
        const expectedPath = path.join(root, 'assets', 'missing.png');

        expect(result).toBe(pathToFileURL(expectedPath).href);
        expect(console.warn).toHaveBeenCalledWith(`[ImageReference] Image file not found: ${expectedPath}`);
    });

    it('should encode characters that are not valid in URIs', () => {
        const result = normalizeImageReference('my scene.png', { workingRoot: '/frames', fileExists: () => true });
        expect(result).toBe('file:///frames/my%20scene.png');
    });

    it('should leave an empty reference empty', () => {
        expect(normalizeImageReference('', { workingRoot: root })).toBe('');
    });
});
