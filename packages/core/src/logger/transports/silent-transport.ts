import type { LoggerTransport } from '../types.js';

/**
 * Drops every entry. Used when storage is embedded in a host that owns logging.
 */
export class SilentTransport implements LoggerTransport {
    write(): void {}
}
