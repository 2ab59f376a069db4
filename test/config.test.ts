import {
    ConfigError,
    createRuntimeConfig,
    DEFAULT_LISTEN_ADDRESS,
    DEFAULT_SOCKS_ADDRESS,
    formatSocketAddress,
    parseSocketAddress,
} from '../src/config';

describe('parseSocketAddress', () => {
    test.each([
        ['127.0.0.1:8080', { host: '127.0.0.1', port: 8080 }],
        ['localhost:1080', { host: 'localhost', port: 1080 }],
        ['[::1]:1080', { host: '::1', port: 1080 }],
        [' 0.0.0.0:3128 ', { host: '0.0.0.0', port: 3128 }],
    ])('%s', (text, expected) => {
        expect(parseSocketAddress(text)).toEqual(expected);
    });

    test.each([
        ['no port', 'localhost'],
        ['empty port', 'localhost:'],
        ['no host', ':8080'],
        ['port out of range', 'localhost:65536'],
        ['port with sign', 'localhost:+80'],
        ['unbracketed IPv6', '::1:1080'],
        ['unclosed bracket', '[::1:1080'],
        ['bracket without port', '[::1]'],
    ])('rejects an address with %s', (_name, text) => {
        expect(() => parseSocketAddress(text)).toThrow(ConfigError);
    });

    test('port 0 is only accepted when asked for', () => {
        expect(() => parseSocketAddress('127.0.0.1:0')).toThrow(ConfigError);
        expect(parseSocketAddress('127.0.0.1:0', { allowZeroPort: true })).toEqual({ host: '127.0.0.1', port: 0 });
    });
});

describe('formatSocketAddress', () => {
    test('puts IPv6 hosts in brackets', () => {
        expect(formatSocketAddress({ host: '::1', port: 1080 })).toBe('[::1]:1080');
        expect(formatSocketAddress({ host: 'example.com', port: 443 })).toBe('example.com:443');
    });
});

describe('createRuntimeConfig', () => {
    test('uses the defaults', () => {
        expect(createRuntimeConfig()).toEqual({
            listen: parseSocketAddress(DEFAULT_LISTEN_ADDRESS),
            socks: parseSocketAddress(DEFAULT_SOCKS_ADDRESS),
            forward: false,
        });
    });

    test('accepts strings and objects', () => {
        expect(createRuntimeConfig({ listen: '0.0.0.0:0', socks: { host: '10.0.0.2', port: 9050 }, forward: true })).toEqual({
            listen: { host: '0.0.0.0', port: 0 },
            socks: { host: '10.0.0.2', port: 9050 },
            forward: true,
        });
    });

    test('returns a frozen object', () => {
        const config = createRuntimeConfig();

        expect(Object.isFrozen(config)).toBe(true);
        expect(Object.isFrozen(config.listen)).toBe(true);
        expect(Object.isFrozen(config.socks)).toBe(true);
    });

    test('the SOCKS5 server needs a real port', () => {
        expect(() => createRuntimeConfig({ socks: '127.0.0.1:0' })).toThrow(ConfigError);
        expect(() => createRuntimeConfig({ socks: { host: '127.0.0.1', port: 0 } })).toThrow(ConfigError);
        expect(() => createRuntimeConfig({ socks: { host: '', port: 1080 } })).toThrow(ConfigError);
    });
});
