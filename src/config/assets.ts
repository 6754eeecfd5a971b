import * as fs from 'fs';
import * as path from 'path';
import { ConfigurationError } from '../core/errors';
import { AssetDefinition } from '../graph';

function isAssetDefinition(value: unknown): value is AssetDefinition {
    return (
        typeof value === 'object' &&
        value !== null &&
        'symbol' in value && typeof value.symbol === 'string' &&
        'chain' in value && typeof value.chain === 'string' &&
        'address' in value && typeof value.address === 'string' &&
        'decimals' in value && typeof value.decimals === 'number'
    );
}

/**
 * Parse the asset registry file: a JSON array of {symbol, chain, address, decimals}.
 */
export function parseAssetDefinitions(raw: string, source = 'assets'): AssetDefinition[] {
    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new ConfigurationError(source, `invalid JSON: ${reason}`);
    }

    if (!Array.isArray(parsed)) {
        throw new ConfigurationError(source, 'expected an array of asset definitions');
    }

    return parsed.map((value: unknown, index) => {
        if (!isAssetDefinition(value)) {
            throw new ConfigurationError(source, `entry #${index} is not {symbol, chain, address, decimals}`);
        }
        return value;
    });
}

export function loadAssetDefinitions(filePath: string): AssetDefinition[] {
    const resolved = path.resolve(process.cwd(), filePath);
    if (!fs.existsSync(resolved)) {
        throw new ConfigurationError('ASSETS_FILE', `${resolved} not found`);
    }
    return parseAssetDefinitions(fs.readFileSync(resolved, 'utf8'), 'ASSETS_FILE');
}
