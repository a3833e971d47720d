import { parseM3u8, PlaylistParseError } from '../../src/utils/m3u8Parser';

describe('M3U8 Parser', () => {
    const sampleM3u8 = `#EXTM3U
#EXT-X-VERSION:3
#EXT-X-TARGETDURATION:10
#EXTINF:10.0,
a.ts
#EXTINF:10.0,
b.ts
#EXTINF:9.5,Closing shot
c.ts
#EXT-X-ENDLIST`;

    it('should parse a media playlist into ordered segments', () => {
        const result = parseM3u8(sampleM3u8);

        expect(result.kind).toBe('media');
        expect(result.segments.map(segment => segment.uri)).toEqual(['a.ts', 'b.ts', 'c.ts']);
        if (result.kind === 'media') {
            expect(result.version).toBe(3);
            expect(result.targetDuration).toBe(10);
            expect(result.mediaSequence).toBe(0);
            expect(result.endList).toBe(true);
        }
    });

    it('should record duration, title and URI line of each segment', () => {
        const result = parseM3u8(sampleM3u8);

        expect(result.segments[0]).toEqual({ uri: 'a.ts', duration: 10, lineNumber: 5 });
        expect(result.segments[2]).toEqual({ uri: 'c.ts', duration: 9.5, title: 'Closing shot', lineNumber: 9 });
    });

    it('should return no segments for a master playlist', () => {
        const master = `#EXTM3U
#EXT-X-STREAM-INF:BANDWIDTH=1280000,RESOLUTION=1280x720
720p/index.m3u8
#EXT-X-STREAM-INF:BANDWIDTH=640000,RESOLUTION=640x360
360p/index.m3u8`;

        const result = parseM3u8(master);

        expect(result.kind).toBe('master');
        expect(result.segments).toEqual([]);
        if (result.kind === 'master') {
            expect(result.variants.map(variant => variant.uri)).toEqual(['720p/index.m3u8', '360p/index.m3u8']);
            expect(result.variants[0].attributes).toBe('BANDWIDTH=1280000,RESOLUTION=1280x720');
        }
    });

    it('should reject a truncated header', () => {
        expect(() => parseM3u8('#EXTM\n#EXTINF:10.0,\na.ts')).toThrow(PlaylistParseError);
    });

    it('should reject empty content', () => {
        expect(() => parseM3u8('  \n\n')).toThrow('Line 1: Empty playlist');
    });

    it('should reject a non-numeric segment duration', () => {
        const invalid = `#EXTM3U
#EXTINF:ten,
a.ts`;

        expect(() => parseM3u8(invalid)).toThrow('Line 2: #EXTINF expects a duration, got "ten"');
    });

    it('should reject a non-integer target duration', () => {
        try {
            parseM3u8('#EXTM3U\n#EXT-X-TARGETDURATION:abc\n');
            throw new Error('expected a parse error');
        } catch (error) {
            expect(error).toBeInstanceOf(PlaylistParseError);
            if (error instanceof PlaylistParseError) {
                expect(error.lineNumber).toBe(2);
            }
        }
    });

    it('should reject a playlist that mixes master and media tags', () => {
        const mixed = `#EXTM3U
#EXT-X-STREAM-INF:BANDWIDTH=1
low.m3u8
#EXTINF:10.0,
a.ts`;

        expect(() => parseM3u8(mixed)).toThrow('Line 4: Playlist mixes master and media tags');
    });

    it('should skip segments with empty or malformed URIs', () => {
        const playlist = `#EXTM3U
#EXT-X-TARGETDURATION:10
#EXTINF:10.0,
#EXTINF:10.0,
first.ts
#EXTINF:10.0,
bad segment.ts
#EXTINF:10.0,
last.ts
#EXTINF:10.0,`;

        const result = parseM3u8(playlist);

        expect(result.segments.map(segment => segment.uri)).toEqual(['first.ts', 'last.ts']);
    });

    it('should handle comments, blank lines, CRLF endings and a byte order mark', () => {
        const playlist = '\uFEFF#EXTM3U\r\n#EXT-X-TARGETDURATION:10\r\n\r\n# a comment\r\n#EXTINF:10.0,\r\nseg0.ts\r\n\r\n#EXTINF:10.0,\r\nseg1.ts\r\n';

        const result = parseM3u8(playlist);

        expect(result.segments.map(segment => segment.uri)).toEqual(['seg0.ts', 'seg1.ts']);
    });

    it('should ignore URI lines without #EXTINF', () => {
        const result = parseM3u8(`#EXTM3U
#EXT-X-VERSION:3
Invalid content without any segments`);

        expect(result.kind).toBe('media');
        expect(result.segments).toEqual([]);
    });

    it('should keep absolute segment URIs as written', () => {
        const result = parseM3u8(`#EXTM3U
#EXT-X-MEDIA-SEQUENCE:7
#EXTINF:4,
https://media.example/a/seg7.ts?token=test-token`);

        expect(result.segments[0].uri).toBe('https://media.example/a/seg7.ts?token=test-token');
        if (result.kind === 'media') {
            expect(result.mediaSequence).toBe(7);
            expect(result.endList).toBe(false);
        }
    });
});
