import express from 'express';
import type { Express, Request, Response } from 'express';
import type { Server } from 'http';
import { stat } from 'fs/promises';
import { basename, extname, resolve } from 'path';
import { Logger } from '../Logger';
import { FileNotFoundError } from '../errors';
import { DownloadTokenStore } from './DownloadTokenStore';
import { HttpError, asyncHandler, createErrorHandler } from './errorHandler';
import type { Clock } from '../recording/types';

export interface DownloadServerOptions {
    host: string;
    port: number;
    /** Base of issued links. Defaults to `http://<host>:<bound port>`. */
    publicUrl?: string;
    tokenTtlSeconds: number;
    shutdownGraceMs?: number;
    now?: Clock;
    logger?: Logger;
}

export interface HealthStatus {
    status: 'healthy';
    active_tokens: number;
}

const CONTENT_TYPES: Record<string, string> = {
    '.mp3': 'audio/mpeg',
    '.wav': 'audio/wav'
};

const DEFAULT_SHUTDOWN_GRACE_MS = 5_000;

/**
 * Serves finished recordings behind short-lived bearer links. Tokens live
 * only in memory, so a restart invalidates every issued link.
 */
export class DownloadServer {
    public readonly app: Express;
    private readonly tokens: DownloadTokenStore;
    private readonly logger: Logger;
    private readonly shutdownGraceMs: number;
    private server?: Server;
    private listening?: Promise<void>;
    private stopping?: Promise<void>;
    private boundPort?: number;

    constructor(private readonly options: DownloadServerOptions) {
        this.logger = (options.logger ?? new Logger()).child('DownloadServer');
        this.tokens = new DownloadTokenStore(options.tokenTtlSeconds * 1000, options.now);
        this.shutdownGraceMs = options.shutdownGraceMs ?? DEFAULT_SHUTDOWN_GRACE_MS;
        this.app = this.createApp();
    }

    private createApp(): Express {
        const app = express();
        app.disable('x-powered-by');

        app.get('/', (_req, res) => {
            res.json({ message: 'voxtape download server' });
        });

        app.get('/health', (_req, res) => {
            res.json(this.health());
        });

        app.get('/download/:token', asyncHandler((req, res) => this.handleDownload(req.params.token, res)));

        app.use((_req: Request, res: Response) => {
            res.status(404).json({ detail: 'Not Found' });
        });

        app.use(createErrorHandler(this.logger));
        return app;
    }

    private async handleDownload(token: string, res: Response): Promise<void> {
        const lookup = this.tokens.lookup(token);
        if (lookup.status === 'unknown') {
            throw new HttpError(404, 'Invalid or expired download link');
        }
        if (lookup.status === 'expired') {
            throw new HttpError(404, 'Download link has expired');
        }

        const { filePath } = lookup;
        if (!(await isFile(filePath))) {
            this.tokens.revoke(token);
            throw new FileNotFoundError(filePath);
        }

        const filename = basename(filePath);
        this.logger.info(`Serving ${filename}`);

        await new Promise<void>((resolveDownload, rejectDownload) => {
            res.download(filePath, filename, { headers: { 'Content-Type': contentTypeFor(filePath) } }, (error) => {
                if (!error) {
                    resolveDownload();
                } else if (res.headersSent) {
                    // The client went away mid-transfer; nothing left to answer.
                    this.logger.warn(`Download of ${filename} aborted: ${error.message}`);
                    resolveDownload();
                } else {
                    rejectDownload(error);
                }
            });
        });
    }

    /** Mints a fresh link for an existing file. */
    public async createLink(filePath: string): Promise<string> {
        const absolutePath = resolve(filePath);
        if (!(await isFile(absolutePath))) {
            throw new FileNotFoundError(filePath);
        }

        const token = this.tokens.issue(absolutePath);
        this.logger.debug(`Issued download token for ${basename(absolutePath)}`);
        return `${this.getBaseUrl()}/download/${token}`;
    }

    public health(): HealthStatus {
        return { status: 'healthy', active_tokens: this.tokens.size() };
    }

    public getBaseUrl(): string {
        if (this.options.publicUrl) {
            return this.options.publicUrl.replace(/\/+$/, '');
        }
        return `http://${this.options.host}:${this.boundPort ?? this.options.port}`;
    }

    public getPort(): number | undefined {
        return this.boundPort;
    }

    public start(): Promise<void> {
        if (this.listening) return this.listening;

        this.listening = new Promise<void>((resolveStart, rejectStart) => {
            const server = this.app.listen(this.options.port, this.options.host);
            this.server = server;

            server.once('error', (error) => {
                this.server = undefined;
                this.listening = undefined;
                rejectStart(error);
            });
            server.once('listening', () => {
                const address = server.address();
                this.boundPort = typeof address === 'object' && address ? address.port : this.options.port;
                this.logger.info(`Download server listening on ${this.options.host}:${this.boundPort}`);
                resolveStart();
            });
        });
        return this.listening;
    }

    /**
     * Stops accepting connections and gives in-flight downloads the grace
     * period to finish. Overlapping calls share one shutdown.
     */
    public stop(): Promise<void> {
        if (this.stopping) return this.stopping;

        const server = this.server;
        if (!server) return Promise.resolve();

        const listening = this.listening;
        this.server = undefined;
        this.listening = undefined;
        this.stopping = this.closeServer(server, listening).finally(() => {
            this.stopping = undefined;
        });
        return this.stopping;
    }

    private async closeServer(server: Server, listening?: Promise<void>): Promise<void> {
        if (listening) {
            await listening;
        }

        await new Promise<void>((resolveStop, rejectStop) => {
            const forceClose = setTimeout(() => {
                this.logger.warn('Closing connections still open after the shutdown grace period');
                server.closeAllConnections();
            }, this.shutdownGraceMs);
            forceClose.unref();

            server.close((error) => {
                clearTimeout(forceClose);
                if (error) {
                    rejectStop(error);
                } else {
                    resolveStop();
                }
            });
            server.closeIdleConnections();
        });
        this.logger.info('Download server stopped');
    }
}

export function contentTypeFor(filePath: string): string {
    return CONTENT_TYPES[extname(filePath).toLowerCase()] ?? 'application/octet-stream';
}

async function isFile(filePath: string): Promise<boolean> {
    try {
        return (await stat(filePath)).isFile();
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return false;
        throw error;
    }
}
