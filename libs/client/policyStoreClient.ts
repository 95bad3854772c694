import { z } from 'zod';
import { IdentitySchema, type Identity } from '../context/identity.js';
import {
    ACTIVATE_PATH,
    ADD_VERSION_PATH,
    DEACTIVATE_PATH,
    GET_ACTIVATOR_PATH,
    GET_ACTIVE_VERSION_PATH,
    GET_VERSION_CONTENT_PATH,
    GET_VERSION_METADATA_PATH,
    GET_VERSIONS_PATH,
    instantiatePath,
    type EndpointPath,
} from '../http/endpoints.js';
import { MetadataSchema, type AttachedMetadata, type Metadata } from '../policy/types.js';
import { PolicyContentSchema, VersionNumberSchema, type PolicyContent } from '../validation/schema.js';

export class PolicyStoreClientError extends Error {
    constructor(
        public readonly endpoint: EndpointPath,
        public readonly status: number,
        public readonly body: string
    ) {
        super(`${endpoint.method} ${endpoint.path} failed with status ${status}${body ? `: ${body}` : ''}`);
        this.name = 'PolicyStoreClientError';
        Object.setPrototypeOf(this, PolicyStoreClientError.prototype);
    }
}

const AddVersionResponseSchema = z.object({ version: VersionNumberSchema });
const GetVersionsResponseSchema = z.object({ versions: z.record(MetadataSchema) });
const GetActiveVersionResponseSchema = z.object({ version: VersionNumberSchema.nullable() });
const GetActivatorResponseSchema = z.object({ user: IdentitySchema.nullable() });
const GetVersionMetadataResponseSchema = z.object({ metadata: MetadataSchema });
const GetVersionContentResponseSchema = z.object({ content: PolicyContentSchema });

export interface PolicyStoreClientOptions {
    baseUrl: string;
    /** Raw JWT sent as `Authorization: Bearer <token>`. */
    token?: string;
    fetch?: typeof fetch;
}

/**
 * HTTP client for the policy API, as used by a policy reasoner. Non-2xx
 * answers throw PolicyStoreClientError, except 404 on single-version reads,
 * which resolve with `null`.
 */
export class PolicyStoreClient {
    private readonly baseUrl: string;
    private readonly fetchImpl: typeof fetch;

    constructor(private readonly options: PolicyStoreClientOptions) {
        this.baseUrl = options.baseUrl.replace(/\/+$/, '');
        this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    }

    async addVersion(metadata: AttachedMetadata, contents: PolicyContent): Promise<number> {
        const body = await this.call(ADD_VERSION_PATH, [], { metadata, contents });
        return AddVersionResponseSchema.parse(body).version;
    }

    async activate(version: number): Promise<void> {
        await this.call(ACTIVATE_PATH, [], { version });
    }

    async deactivate(): Promise<void> {
        await this.call(DEACTIVATE_PATH);
    }

    async getVersions(): Promise<Map<number, Metadata>> {
        const body = GetVersionsResponseSchema.parse(await this.call(GET_VERSIONS_PATH));
        const versions = new Map<number, Metadata>();
        for (const metadata of Object.values(body.versions)) {
            versions.set(metadata.version, metadata);
        }
        return versions;
    }

    async getActiveVersion(): Promise<number | null> {
        return GetActiveVersionResponseSchema.parse(await this.call(GET_ACTIVE_VERSION_PATH)).version;
    }

    async getActivator(): Promise<Identity | null> {
        return GetActivatorResponseSchema.parse(await this.call(GET_ACTIVATOR_PATH)).user;
    }

    async getVersionMetadata(version: number): Promise<Metadata | null> {
        const body = await this.call(GET_VERSION_METADATA_PATH, [String(version)], undefined, true);
        return body === null ? null : GetVersionMetadataResponseSchema.parse(body).metadata;
    }

    async getVersionContent(version: number): Promise<PolicyContent | null> {
        const body = await this.call(GET_VERSION_CONTENT_PATH, [String(version)], undefined, true);
        return body === null ? null : GetVersionContentResponseSchema.parse(body).content;
    }

    /** Resolves with the parsed JSON body, `undefined` for an empty one, or `null` on an allowed 404. */
    private async call(endpoint: EndpointPath, args: string[] = [], payload?: unknown, notFoundIsNull = false): Promise<unknown> {
        const headers: Record<string, string> = { accept: 'application/json' };
        if (this.options.token !== undefined) {
            headers.authorization = `Bearer ${this.options.token}`;
        }
        if (payload !== undefined) {
            headers['content-type'] = 'application/json';
        }

        const response = await this.fetchImpl(`${this.baseUrl}${instantiatePath(endpoint, args)}`, {
            method: endpoint.method,
            headers,
            body: payload === undefined ? undefined : JSON.stringify(payload),
        });
        const text = await response.text();

        if (response.status === 404 && notFoundIsNull) {
            return null;
        }
        if (!response.ok) {
            throw new PolicyStoreClientError(endpoint, response.status, text);
        }
        return text === '' ? undefined : JSON.parse(text);
    }
}
