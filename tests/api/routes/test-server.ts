import { Server } from 'http';
import { Express } from 'express';

export interface TestResponse {
    status: number;
    body: unknown;
}

export interface TestServer {
    send(method: string, path: string, body?: unknown): Promise<TestResponse>;
    close(): Promise<void>;
}

/** Serves `app` on an ephemeral local port for the duration of a suite. */
export async function startTestServer(app: Express): Promise<TestServer> {
    const server: Server = app.listen(0, '127.0.0.1');
    await new Promise<void>(resolve => server.once('listening', resolve));

    const address = server.address();
    if (address === null || typeof address === 'string') {
        throw new Error('Test server is not listening on a TCP port');
    }
    const baseUrl = `http://127.0.0.1:${address.port}`;

    return {
        async send(method, path, body) {
            const response = await fetch(`${baseUrl}${path}`, {
                method,
                headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
                body: body === undefined ? undefined : JSON.stringify(body)
            });
            const payload: unknown = await response.json();
            return { status: response.status, body: payload };
        },
        close() {
            server.closeAllConnections();
            return new Promise<void>((resolve, reject) => {
                server.close(error => (error ? reject(error) : resolve()));
            });
        }
    };
}
