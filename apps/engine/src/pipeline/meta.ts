/**
 * Meta Extraction
 *
 * Pulls the META_TITLE / META_DESCRIPTION sentinel lines out of
 * generated content.
 */

import { META_DESCRIPTION_PREFIX, META_TITLE_PREFIX } from '../providers/ai/prompts';

export interface BlogMeta {
    metaTitle: string;
    metaDescription: string;
}

/**
 * Scan line by line; the first occurrence of each sentinel wins
 */
export function extractMeta(content: string): BlogMeta {
    let metaTitle: string | undefined;
    let metaDescription: string | undefined;

    for (const line of content.split(/\r?\n/)) {
        if (metaTitle === undefined && line.startsWith(META_TITLE_PREFIX)) {
            metaTitle = line.slice(META_TITLE_PREFIX.length).trim();
        } else if (metaDescription === undefined && line.startsWith(META_DESCRIPTION_PREFIX)) {
            metaDescription = line.slice(META_DESCRIPTION_PREFIX.length).trim();
        }

        if (metaTitle !== undefined && metaDescription !== undefined) break;
    }

    return {
        metaTitle: metaTitle ?? '',
        metaDescription: metaDescription ?? '',
    };
}

export default { extractMeta };
