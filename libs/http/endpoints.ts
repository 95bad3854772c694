/**
 * Where each policy API operation lives. Shared by the server's router and
 * by PolicyStoreClient so the two cannot drift apart.
 */

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface EndpointPath {
    readonly method: HttpMethod;
    /** Segments written as `{name}` are filled in by {@link instantiatePath}. */
    readonly path: string;
}

export const ADD_VERSION_PATH: EndpointPath = { method: 'POST', path: '/v2/policies' };
export const ACTIVATE_PATH: EndpointPath = { method: 'PUT', path: '/v2/policies/active' };
export const DEACTIVATE_PATH: EndpointPath = { method: 'DELETE', path: '/v2/policies/active' };
export const GET_VERSIONS_PATH: EndpointPath = { method: 'GET', path: '/v2/policies' };
export const GET_ACTIVE_VERSION_PATH: EndpointPath = { method: 'GET', path: '/v2/policies/active' };
export const GET_ACTIVATOR_PATH: EndpointPath = { method: 'GET', path: '/v2/policies/active/activator' };
export const GET_VERSION_METADATA_PATH: EndpointPath = { method: 'GET', path: '/v2/policies/{version}' };
export const GET_VERSION_CONTENT_PATH: EndpointPath = { method: 'GET', path: '/v2/policies/{version}/content' };

const PARAM = /^\{(\w+)\}$/;

/**
 * Fills the path's parameters with `args`, in order.
 * @throws Error when the count does not match, or an argument contains '/'
 */
export function instantiatePath(endpoint: EndpointPath, args: readonly string[] = []): string {
    let used = 0;
    const segments = endpoint.path.split('/').map(segment => {
        if (!PARAM.test(segment)) return segment;
        if (used >= args.length) {
            throw new Error(`Not enough arguments given for path '${endpoint.path}' (got ${args.length})`);
        }
        const arg = args[used++];
        if (arg.includes('/')) {
            throw new Error(`Path argument '${arg}' for '${endpoint.path}' may not contain '/'`);
        }
        return encodeURIComponent(arg);
    });

    if (used < args.length) {
        throw new Error(`Too many arguments given for path '${endpoint.path}' (expected ${used}, got ${args.length})`);
    }
    return segments.join('/');
}

/** Same path in express route syntax (`{version}` becomes `:version`). */
export function toRoutePath(endpoint: EndpointPath): string {
    return endpoint.path
        .split('/')
        .map(segment => segment.replace(PARAM, ':$1'))
        .join('/');
}
