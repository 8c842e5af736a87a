import { once } from 'events';
import { Application } from 'express';
import { AppError, ErrorKind } from '../../errors/app-error';
import { PasswordHasher } from '../../utils/password';

// fast stand-in for bcrypt
export const plainHasher: PasswordHasher = {
    hash: async (plain) => `hashed:${plain}`,
    verify: async (plain, hash) => hash === `hashed:${plain}`,
};

export function captureError(fn: () => unknown): unknown {
    try {
        fn();
    } catch (error) {
        return error;
    }
    throw new Error('expected function to throw');
}

export function errorKind(error: unknown): ErrorKind | undefined {
    return error instanceof AppError ? error.kind : undefined;
}

export interface TestServer {
    baseUrl: string;
    close(): Promise<void>;
}

// real express app on an ephemeral local port
export async function startTestServer(app: Application): Promise<TestServer> {
    const server = app.listen(0, '127.0.0.1');
    await once(server, 'listening');

    const address = server.address();
    if (address === null || typeof address === 'string') {
        throw new Error('server did not bind to a TCP port');
    }

    return {
        baseUrl: `http://127.0.0.1:${address.port}`,
        close: () => new Promise<void>((resolve, reject) => {
            server.closeAllConnections();
            server.close((err) => (err ? reject(err) : resolve()));
        }),
    };
}
