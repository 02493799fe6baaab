/**
 * Repository name utilities for Docker Hub
 */

import { DOCKER_HUB } from '../config/constants';
import { ValidationError } from './errors';

const PATH_COMPONENT = /^[a-z0-9]+(?:(?:[._]|__|-+)[a-z0-9]+)*$/;

/**
 * Normalize a repository reference to namespace/name.
 * Official images (no namespace) live under "library".
 */
export function normalizeRepository(repository: string): string {
    const trimmed = (repository || '').trim().toLowerCase().replace(/^\/+|\/+$/g, '');
    if (!trimmed) {
        throw new ValidationError('Repository name is required');
    }

    const parts = trimmed.split('/');
    if (parts.length > 2 || !parts.every((part) => PATH_COMPONENT.test(part))) {
        throw new ValidationError(`Invalid repository name: ${repository}`);
    }

    return parts.length === 1 ? `${DOCKER_HUB.OFFICIAL_NAMESPACE}/${trimmed}` : trimmed;
}

/**
 * First page URL of the tag listing
 */
export function buildTagsUrl(baseUrl: string, repository: string, pageSize: number): string {
    const [namespace = '', name = ''] = repository.split('/');
    const path = `${encodeURIComponent(namespace)}/${encodeURIComponent(name)}`;
    return `${baseUrl.replace(/\/+$/, '')}/repositories/${path}/tags?page_size=${pageSize}`;
}
