#!/usr/bin/env node
import fs from 'node:fs';
import path from 'node:path';

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import type { RuntimeConfig } from './config';
import { createRuntimeConfig, DEFAULT_LISTEN_ADDRESS, DEFAULT_SOCKS_ADDRESS, formatSocketAddress } from './config';
import { log } from './logger';
import { Server } from './server';
import { describeError } from './utils/format_error_chain';

export const USAGE = `Usage: socks-adapter [options]

Relays HTTP proxy requests (CONNECT and plain HTTP) through a SOCKS5 server.

Options:
  -l, --listen <host:port>  Address to bind for inbound connections (default: ${DEFAULT_LISTEN_ADDRESS})
  -s, --socks <host:port>   Address of the upstream SOCKS5 server (default: ${DEFAULT_SOCKS_ADDRESS})
  -f, --forward             Forward raw TCP to the SOCKS5 server, without HTTP handling
  -h, --help                Print this help and exit
  -V, --version             Print the version and exit

Environment:
  LOG_LEVEL                 silly, verbose, info, http, warn, error or silent (default: info)`;

export type CliAction =
    | { type: 'run'; config: RuntimeConfig }
    | { type: 'help' }
    | { type: 'version' };

/**
 * Maps command line arguments onto a runtime config.
 * Throws on unknown options, missing values and invalid addresses.
 */
export const parseCliArgs = (args: string[]): CliAction => {
    // yargs' own help and version handling would exit the process, USAGE is printed by main() instead.
    const values = yargs(args)
        .scriptName('socks-adapter')
        .option('listen', { alias: 'l', type: 'string', default: DEFAULT_LISTEN_ADDRESS, requiresArg: true })
        .option('socks', { alias: 's', type: 'string', default: DEFAULT_SOCKS_ADDRESS, requiresArg: true })
        .option('forward', { alias: 'f', type: 'boolean', default: false })
        .option('help', { alias: 'h', type: 'boolean', default: false })
        .option('version', { alias: 'V', type: 'boolean', default: false })
        .help(false)
        .version(false)
        .strict()
        .exitProcess(false)
        .fail((message, error) => {
            throw error ?? new Error(message);
        })
        .parseSync();

    if (values.help) return { type: 'help' };
    if (values.version) return { type: 'version' };

    return {
        type: 'run',
        config: createRuntimeConfig({
            listen: values.listen,
            socks: values.socks,
            forward: values.forward,
        }),
    };
};

export const readPackageVersion = (): string => {
    // Both src/ and dist/ sit next to package.json.
    const packageJson: unknown = JSON.parse(fs.readFileSync(path.join(__dirname, '..', 'package.json'), 'utf8'));

    if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson && typeof packageJson.version === 'string') {
        return packageJson.version;
    }

    return 'unknown';
};

export const main = async (args: string[]): Promise<void> => {
    let action: CliAction;
    try {
        action = parseCliArgs(args);
    } catch (error) {
        console.error(`error: ${describeError(error)}\n\n${USAGE}`);
        process.exitCode = 2;
        return;
    }

    if (action.type === 'help') {
        console.log(USAGE);
        return;
    }

    if (action.type === 'version') {
        console.log(readPackageVersion());
        return;
    }

    const { config } = action;
    const server = new Server(config);

    try {
        await server.listen();
    } catch (error) {
        log.error('cli', 'Failed to listen on %s: %s', formatSocketAddress(config.listen), describeError(error));
        process.exitCode = 1;
        return;
    }

    const listenAddress = formatSocketAddress({ host: config.listen.host, port: server.port });
    const socksAddress = formatSocketAddress(config.socks);

    if (config.forward) {
        log.info('cli', 'TCP forward mode listening on: %s', listenAddress);
        log.info('cli', 'Forwarding all traffic to SOCKS5: %s', socksAddress);
    } else {
        log.info('cli', 'HTTP proxy listening on: %s', listenAddress);
        log.info('cli', 'Relaying requests through SOCKS5: %s', socksAddress);
    }

    const shutdown = (signal: NodeJS.Signals) => {
        log.info('cli', 'Received %s, shutting down', signal);

        server.close(true).then(
            () => process.exit(0),
            (error: unknown) => {
                log.error('cli', 'Failed to close the server: %s', describeError(error));
                process.exit(1);
            },
        );
    };

    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
};

if (require.main === module) {
    main(hideBin(process.argv)).catch((error: unknown) => {
        log.error('cli', 'Unexpected error: %s', describeError(error));
        process.exit(1);
    });
}
