import express from 'express';
import bodyParser from 'body-parser';
import cors from 'cors';
import type { Server } from 'http';
import type { RegistryKernel } from '../kernel-core/Kernel.js';
import { Identity } from '../kernel-core/L1/Identity.js';
import { RegistryGateway } from '../Platform/Gateway.js';
import { NotFoundError, ValidationError, translateError } from '../Platform/Errors.js';

function parseRecordId(raw: string): number {
    const id = Number(raw);
    if (!Number.isSafeInteger(id) || id < 1) throw new ValidationError(`Invalid record id: ${raw}`);
    return id;
}

export class RegistryServer {
    private app: express.Express;
    private gateway: RegistryGateway;
    private server?: Server;

    constructor(private kernel: RegistryKernel, private port: number = 3000) {
        this.gateway = new RegistryGateway(kernel);
        this.app = express();
        this.app.use(cors());
        this.app.use(bodyParser.json());
        this.setupRoutes();
    }

    public get App(): express.Express { return this.app; }

    public start(): Promise<number> {
        return new Promise((resolve, reject) => {
            const server = this.app.listen(this.port, () => {
                const address = server.address();
                const port = typeof address === 'object' && address !== null ? address.port : this.port;
                console.log(`[RegistryServer] Listening on port ${port}`);
                resolve(port);
            });
            server.on('error', reject);
            this.server = server;
        });
    }

    public stop(): Promise<void> {
        return new Promise((resolve, reject) => {
            if (!this.server) return resolve();
            this.server.close((err) => (err ? reject(err) : resolve()));
        });
    }

    private setupRoutes() {
        this.app.get('/status', (_req, res) => {
            res.json({ owner: this.kernel.Owner, sequence: this.kernel.Sequence });
        });

        // Writes
        this.app.post('/commands', (req, res) => {
            const result = this.gateway.execute(req.body);
            if (result.ok) {
                res.json({ ok: true, value: result.value ?? null });
                return;
            }
            const err = translateError(result.error);
            res.status(err.status).json({ ok: false, error: { code: err.code, message: err.message } });
        });

        // Records
        this.app.get('/records/count', (_req, res) => {
            res.json({ total: this.kernel.getTotalRecords() });
        });

        this.app.get('/records/:id', (req, res) => {
            const id = parseRecordId(req.params.id);
            const record = this.kernel.getParasiteRecord(id);
            if (!record) throw new NotFoundError(`Record ${id} does not exist`, 'INVALID_RECORD');
            res.json(record);
        });

        this.app.get('/records/:id/history', (req, res) => {
            const result = this.kernel.getParasiteRecordHistory(parseRecordId(req.params.id));
            if (!result.ok) throw result.error;
            res.json(result.value);
        });

        // Institutions & Researchers
        this.app.get('/institutions/:id', (req, res) => {
            const institution = this.kernel.getInstitutionDetails(req.params.id);
            if (!institution) throw new NotFoundError(`Institution ${req.params.id} does not exist`, 'INVALID_INSTITUTION');
            res.json(institution);
        });

        this.app.get('/researchers/:identity', (req, res) => {
            const institutionId = this.kernel.getResearcherMembership(Identity.fromHex(req.params.identity));
            res.json({ identity: req.params.identity.toLowerCase(), institutionId: institutionId ?? null });
        });

        // Geographic Aggregates
        this.app.get('/geo-stats/:region', (req, res) => {
            const stat = this.kernel.getGeographicStats(req.params.region);
            if (!stat) throw new NotFoundError(`No records for region ${req.params.region}`, 'UNKNOWN_REGION');
            res.json(stat);
        });

        // Ledger
        this.app.get('/audit', (_req, res) => {
            res.json(this.kernel.Ledger.getHistory());
        });

        this.app.get('/audit/verify', (_req, res) => {
            const report = this.kernel.verifyIntegrity();
            res.json({ ok: report.chainValid && report.violations.length === 0, ...report });
        });

        this.app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
            const platformError = translateError(err);
            if (platformError.status >= 500) console.error(`[RegistryServer] ${platformError.message}`);
            res.status(platformError.status).json({ ok: false, error: { code: platformError.code, message: platformError.message } });
        });
    }
}
