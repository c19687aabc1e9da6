import * as path from 'path';

/**
 * Root for persistent data.
 * Order: `CHARTVAULT_DATA_DIR`, then `<cwd>/data`.
 */
export function getDataDir(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): string {
    const override = env.CHARTVAULT_DATA_DIR?.trim();
    if (override) {
        return path.resolve(cwd, override);
    }
    return path.join(cwd, 'data');
}

/**
 * Directory for stored images.
 * Order: `CHARTVAULT_STORAGE_DIR`, then `<data dir>/storage`.
 */
export function getStorageDir(
    env: NodeJS.ProcessEnv = process.env,
    cwd: string = process.cwd()
): string {
    const override = env.CHARTVAULT_STORAGE_DIR?.trim();
    if (override) {
        return path.resolve(cwd, override);
    }
    return path.join(getDataDir(env, cwd), 'storage');
}
