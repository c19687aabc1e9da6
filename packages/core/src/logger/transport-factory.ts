import type { LoggerTransportConfig } from './schemas.js';
import { ConsoleTransport } from './transports/console-transport.js';
import { FileTransport } from './transports/file-transport.js';
import { SilentTransport } from './transports/silent-transport.js';
import type { LoggerTransport } from './types.js';

/**
 * Instantiate validated transport configs, in order
 */
export function createTransports(configs: readonly LoggerTransportConfig[]): LoggerTransport[] {
    return configs.map((config): LoggerTransport => {
        switch (config.type) {
            case 'silent':
                return new SilentTransport();
            case 'console':
                return new ConsoleTransport({ colorize: config.colorize });
            case 'file':
                return new FileTransport({
                    path: config.path,
                    maxSize: config.maxSize,
                    maxFiles: config.maxFiles,
                });
        }
    });
}
