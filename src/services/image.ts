/**
 * ================================================================================
 * IMAGE RESOLVER - Published Image Manifests
 * ================================================================================
 *
 * Symbolic image selectors ('std', 'hpc') point at small plain-text manifests that
 * name the current image id. Any other selector is taken as a literal image id.
 *
 * @license BSD-3-Clause
 */

import axios from 'axios';
import type { ImageClass } from '../types';
import { ImageResolutionError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export type ImageManifests = Record<ImageClass, string>;

export type TextFetcher = (url: string) => Promise<string>;

const SELECTOR_CLASSES = new Map<string, ImageClass>([
    ['std', 'standard'],
    ['standard', 'standard'],
    ['hpc', 'hpc'],
    ['high-performance', 'hpc']
]);

export function imageClassOf(selector: string): ImageClass | undefined {
    return SELECTOR_CLASSES.get(selector.toLowerCase());
}

export const fetchText: TextFetcher = async (url) => {
    const response = await axios.get<string>(url, { responseType: 'text', timeout: 15000 });
    return String(response.data);
};

export interface ImageResolver {
    resolve(selector: string): Promise<string>;
}

export class ManifestImageResolver implements ImageResolver {
    constructor(
        private readonly manifests: ImageManifests,
        private readonly fetch: TextFetcher = fetchText
    ) { }

    /**
     * @throws ImageResolutionError when the manifest is unreachable or empty
     */
    async resolve(selector: string): Promise<string> {
        const imageClass = imageClassOf(selector);
        if (!imageClass) {
            return selector;
        }

        const url = this.manifests[imageClass];
        let body: string;
        try {
            body = await this.fetch(url);
        } catch (error) {
            throw new ImageResolutionError(`Could not read image manifest ${url}: ${errorMessage(error)}`, {
                cause: error
            });
        }

        const imageId = body.split(/\r?\n/).map((line) => line.trim()).find((line) => line.length > 0);
        if (!imageId) {
            throw new ImageResolutionError(`Image manifest ${url} is empty`);
        }

        logger.info(`Image for ${imageClass} instances: ${imageId}`);
        return imageId;
    }
}
