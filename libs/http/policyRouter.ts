import express, { type NextFunction, type Request, type Response, type Router } from 'express';
import type { PolicyConnection, PolicyConnector } from '../contracts/policyConnector.js';
import { RequestContext } from '../context/requestContext.js';
import { getContextLogger } from '../logging/logger.js';
import { metadataToJson } from '../policy/types.js';
import {
    ActivateRequestSchema,
    AddVersionRequestSchema,
    VersionParamSchema,
    type PolicyContent,
} from '../validation/schema.js';
import { validate } from '../validation/zod-middleware.js';
import {
    ACTIVATE_PATH,
    ADD_VERSION_PATH,
    DEACTIVATE_PATH,
    GET_ACTIVATOR_PATH,
    GET_ACTIVE_VERSION_PATH,
    GET_VERSION_CONTENT_PATH,
    GET_VERSION_METADATA_PATH,
    GET_VERSIONS_PATH,
    toRoutePath,
} from './endpoints.js';

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function asyncHandler(handler: AsyncHandler) {
    return (req: Request, res: Response, next: NextFunction): void => {
        handler(req, res).catch(next);
    };
}

/**
 * Opens one connection for the request's identity and always releases it.
 * A client that disconnects before the response is written aborts the
 * operation, unless its transaction is already committing.
 */
async function withConnection<T>(
    connector: PolicyConnector<PolicyContent>,
    res: Response,
    work: (connection: PolicyConnection<PolicyContent>) => Promise<T>
): Promise<T> {
    const identity = RequestContext.get();
    getContextLogger(identity).debug({ method: res.req.method, path: res.req.path }, 'Handling policy request');

    const controller = new AbortController();
    const onClose = () => {
        if (!res.writableEnded) {
            controller.abort(new Error('Client closed the connection'));
        }
    };
    res.on('close', onClose);

    try {
        const connection = await connector.connect(identity, { signal: controller.signal });
        try {
            return await work(connection);
        } finally {
            connection.release();
        }
    } finally {
        res.off('close', onClose);
    }
}

/**
 * The policy API. Expects the auth middleware to have established the
 * RequestContext and a JSON body parser to have run.
 */
export function createPolicyRouter(connector: PolicyConnector<PolicyContent>): Router {
    const router = express.Router();

    router.post(toRoutePath(ADD_VERSION_PATH), asyncHandler(async (req, res) => {
        const body = validate(AddVersionRequestSchema, req.body, 'POST /v2/policies');
        const version = await withConnection(connector, res, connection =>
            connection.addVersion(body.metadata, body.contents)
        );
        res.status(200).json({ version });
    }));

    // The /active routes must be registered before /{version} would capture them.
    router.put(toRoutePath(ACTIVATE_PATH), asyncHandler(async (req, res) => {
        const body = validate(ActivateRequestSchema, req.body, 'PUT /v2/policies/active');
        await withConnection(connector, res, connection => connection.activate(body.version));
        res.status(200).end();
    }));

    router.delete(toRoutePath(DEACTIVATE_PATH), asyncHandler(async (_req, res) => {
        await withConnection(connector, res, connection => connection.deactivate());
        res.status(200).end();
    }));

    router.get(toRoutePath(GET_VERSIONS_PATH), asyncHandler(async (_req, res) => {
        const versions = await withConnection(connector, res, connection => connection.getVersions());
        const body: Record<string, ReturnType<typeof metadataToJson>> = {};
        for (const [version, metadata] of versions) {
            body[String(version)] = metadataToJson(metadata);
        }
        res.status(200).json({ versions: body });
    }));

    router.get(toRoutePath(GET_ACTIVE_VERSION_PATH), asyncHandler(async (_req, res) => {
        const version = await withConnection(connector, res, connection => connection.getActiveVersion());
        res.status(200).json({ version });
    }));

    router.get(toRoutePath(GET_ACTIVATOR_PATH), asyncHandler(async (_req, res) => {
        const user = await withConnection(connector, res, connection => connection.getActivator());
        res.status(200).json({ user: user === null ? null : { id: user.id, name: user.name } });
    }));

    router.get(toRoutePath(GET_VERSION_METADATA_PATH), asyncHandler(async (req, res) => {
        const version = validate(VersionParamSchema, req.params.version, 'GET /v2/policies/{version}');
        const metadata = await withConnection(connector, res, connection => connection.getVersionMetadata(version));
        if (metadata === null) {
            res.status(404).end();
            return;
        }
        res.status(200).json({ metadata: metadataToJson(metadata) });
    }));

    router.get(toRoutePath(GET_VERSION_CONTENT_PATH), asyncHandler(async (req, res) => {
        const version = validate(VersionParamSchema, req.params.version, 'GET /v2/policies/{version}/content');
        const content = await withConnection(connector, res, connection => connection.getVersionContent(version));
        if (content === null) {
            res.status(404).end();
            return;
        }
        res.status(200).json({ content });
    }));

    return router;
}
