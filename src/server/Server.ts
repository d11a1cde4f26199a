import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import type { Server } from 'http';
import { z } from 'zod';
import type { ClaimKernel } from '../kernel-core/Kernel.js';
import type { BlockReceipt, Sequencer } from '../kernel-core/L3/Sequencer.js';
import { encodeEvent } from '../kernel-core/L5/Audit.js';
import { fromHex, toHex } from '../kernel-core/L0/Crypto.js';
import { isKernelError } from '../kernel-core/Errors.js';
import { ClaimNotFoundError, PlatformError, RequestValidationError, fromKernelError } from '../Platform/Errors.js';

const HexString = z.string().regex(/^(0x)?([0-9a-fA-F]{2})*$/, 'Expected hex');
const AccountSchema = z.string().regex(/^[0-9a-f]{64}$/, 'Expected 32-byte lowercase hex public key');

const CallSchema = z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('createClaim'), proof: HexString }),
    z.object({ kind: z.literal('transferClaim'), proof: HexString, newOwner: AccountSchema }),
    z.object({ kind: z.literal('revokeClaim'), proof: HexString })
]);

export const ExtrinsicSchema = z.object({
    signer: AccountSchema,
    nonce: z.number().int().nonnegative(),
    call: CallSchema,
    signature: HexString
});

type Handler = (req: Request, res: Response) => Promise<void> | void;

// Express 4 does not forward rejected promises to the error middleware.
const handle = (fn: Handler) => (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve()
        .then(() => fn(req, res))
        .catch(next);
};

export function serializeReceipt(receipt: BlockReceipt) {
    return {
        number: receipt.number,
        extrinsics: receipt.extrinsics.map(x => ({ ...x, events: x.events.map(encodeEvent) }))
    };
}

export class ClaimServer {
    private app: express.Express;
    private server?: Server;

    constructor(
        private kernel: ClaimKernel,
        private sequencer: Sequencer,
        private port: number = 3000
    ) {
        this.app = express();
        this.app.use(cors());
        this.app.use(express.json());
        this.setupRoutes();
    }

    public get App(): express.Express { return this.app; }

    /**
     * Resolves with the bound port (useful when constructed with port 0).
     */
    public start(): Promise<number> {
        return new Promise((resolve, reject) => {
            const server = this.app.listen(this.port, () => {
                const address = server.address();
                const bound = address && typeof address === 'object' ? address.port : this.port;
                console.log(`[ClaimServer] Listening on port ${bound}`);
                resolve(bound);
            });
            server.on('error', reject);
            this.server = server;
        });
    }

    public close(): Promise<void> {
        return new Promise((resolve, reject) => {
            if (!this.server) return resolve();
            this.server.close(err => (err ? reject(err) : resolve()));
            this.server = undefined;
        });
    }

    private setupRoutes() {
        this.app.get('/status', (req, res) => {
            res.json({
                lifecycle: this.kernel.Lifecycle,
                blockNumber: this.sequencer.Height,
                pending: this.sequencer.Pending,
                claims: this.kernel.Store.size
            });
        });

        this.app.get('/claims/:proof', (req, res) => {
            const proof = fromHex(req.params.proof);
            if (!proof) throw new RequestValidationError('Proof must be hex encoded');

            const record = this.kernel.Claims.getClaim(proof);
            if (!record) throw new ClaimNotFoundError(toHex(proof));

            res.json({ proof: toHex(proof), owner: record.owner, createdAt: record.createdAt });
        });

        this.app.post('/extrinsics', (req, res) => {
            const parsed = ExtrinsicSchema.safeParse(req.body);
            if (!parsed.success) {
                throw new RequestValidationError(
                    'Invalid Extrinsic Structure',
                    parsed.error.errors.map(issue => `${issue.path.join('.')}: ${issue.message}`)
                );
            }
            const hash = this.sequencer.submit(parsed.data);
            res.status(202).json({ hash });
        });

        this.app.post('/blocks', handle(async (req, res) => {
            const receipt = await this.sequencer.produceBlock();
            res.json(serializeReceipt(receipt));
        }));

        this.app.get('/audit', handle(async (req, res) => {
            const limit = Number(req.query.limit) || 50;
            const history = await this.kernel.Audit.getRecent(limit);
            res.json({ count: history.length, data: history });
        }));

        this.app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
            if (res.headersSent) return next(err);

            const error = err instanceof PlatformError ? err
                : isKernelError(err) ? fromKernelError(err)
                : err instanceof SyntaxError ? new RequestValidationError('Request body is not valid JSON')
                : undefined;

            if (!error) {
                console.error(`[ClaimServer] ${req.method} ${req.url} failed:`, err);
                res.status(500).json({ error: 'INTERNAL_ERROR', message: 'Internal Server Error' });
                return;
            }
            if (error.status >= 500) {
                console.error(`[ClaimServer] ${req.method} ${req.url}: ${error.message}`);
            }
            res.status(error.status).json({ error: error.code, message: error.message, ...error.metadata });
        });
    }
}
