import { parseCliArgs, parsePort } from '../../src/utils/cliArgs';

describe('CLI arguments', () => {
    it('should return no overrides without flags', () => {
        expect(parseCliArgs([])).toEqual({});
    });

    it('should read --port in both spellings', () => {
        expect(parseCliArgs(['--port', '9000'])).toEqual({ port: 9000 });
        expect(parseCliArgs(['--port=8081'])).toEqual({ port: 8081 });
    });

    it.each([['abc'], ['0'], ['70000'], ['80.5']])('should reject --port %s', (value) => {
        expect(() => parseCliArgs(['--port', value])).toThrow(`Invalid --port value: ${value}`);
    });

    it('should parse ports shared with the SERVER_PORT override', () => {
        expect(parsePort('65535')).toBe(65535);
        expect(parsePort('')).toBeUndefined();
        expect(parsePort('-1')).toBeUndefined();
    });

    it('should reject unknown flags', () => {
        expect(() => parseCliArgs(['--verbose'])).toThrow();
    });
});
