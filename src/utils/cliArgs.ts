import { parseArgs } from 'util';

export interface CliOptions {
    port?: number;
}

/**
 * Parses the command line. `--port` is the only accepted flag; anything
 * else, or a port outside 1-65535, throws.
 */
export function parseCliArgs(argv: string[]): CliOptions {
    const { values } = parseArgs({
        args: argv,
        options: {
            port: { type: 'string' },
        },
        strict: true,
        allowPositionals: false,
    });

    if (values.port === undefined) {
        return {};
    }

    const port = parsePort(values.port);
    if (port === undefined) {
        throw new Error(`Invalid --port value: ${values.port}`);
    }
    return { port };
}

/** A decimal TCP port in 1-65535, or undefined. */
export function parsePort(value: string): number | undefined {
    const port = Number(value);
    return /^\d+$/.test(value) && port >= 1 && port <= 65535 ? port : undefined;
}
