export const MAX_DOMAIN_NAME_LENGTH = 255;

// https://datatracker.ietf.org/doc/html/rfc1928#section-6
export const socks5ReplyMessages: { [replyCode: number]: string | undefined } = {
    0x01: 'General SOCKS server failure',
    0x02: 'Connection not allowed by ruleset',
    0x03: 'Network unreachable',
    0x04: 'Host unreachable',
    0x05: 'Connection refused',
    0x06: 'TTL expired',
    0x07: 'Command not supported',
    0x08: 'Address type not supported',
};

// Reply names as the socks package puts them in its rejection messages.
export const socks5ReplyCodes: { [replyName: string]: number | undefined } = {
    Granted: 0x00,
    Failure: 0x01,
    NotAllowed: 0x02,
    NetworkUnreachable: 0x03,
    HostUnreachable: 0x04,
    ConnectionRefused: 0x05,
    TTLExpired: 0x06,
    CommandNotSupported: 0x07,
    AddressNotSupported: 0x08,
};
