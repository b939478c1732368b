import { parseFrameSize, resolveTemplateSize } from '../../../src/domain/services/TemplateSizeResolver';

describe('TemplateSizeResolver', () => {
    const fallback = { width: 1080, height: 1920 };

    describe('resolveTemplateSize', () => {
        it('should read the size from a WIDTHxHEIGHT directory', () => {
            expect(resolveTemplateSize('1080x1920/default.html', fallback)).toEqual({ width: 1080, height: 1920 });
        });

        it('should read landscape sizes from absolute paths', () => {
            expect(resolveTemplateSize('/srv/app/templates/1920x1080/modern.html', fallback)).toEqual({ width: 1920, height: 1080 });
        });

        it('should fall back when the path has no size directory', () => {
            expect(resolveTemplateSize('custom_name.html', { width: 720, height: 1280 })).toEqual({ width: 720, height: 1280 });
        });

        it('should ignore a size-like file name', () => {
            expect(resolveTemplateSize('templates/800x600', fallback)).toEqual(fallback);
        });

        it('should prefer the directory closest to the file', () => {
            expect(resolveTemplateSize('1080x1920/variants/720x720/card.html', fallback)).toEqual({ width: 720, height: 720 });
        });

        it('should accept Windows separators', () => {
            expect(resolveTemplateSize('C:\\templates\\1080x1080\\square.html', fallback)).toEqual({ width: 1080, height: 1080 });
        });

        it('should not treat zero dimensions as a size', () => {
            expect(resolveTemplateSize('0x1920/broken.html', fallback)).toEqual(fallback);
        });

        it('should return a copy of the fallback', () => {
            const size = resolveTemplateSize('plain.html', fallback);
            size.width = 1;
            expect(fallback.width).toBe(1080);
        });
    });

    describe('parseFrameSize', () => {
        it('should parse valid tokens', () => {
            expect(parseFrameSize('1280x720')).toEqual({ width: 1280, height: 720 });
            expect(parseFrameSize(' 640x480 ')).toEqual({ width: 640, height: 480 });
        });

        it('should reject malformed tokens', () => {
            expect(parseFrameSize('1280X720')).toBeNull();
            expect(parseFrameSize('1280x')).toBeNull();
            expect(parseFrameSize('wide')).toBeNull();
        });
    });
});
