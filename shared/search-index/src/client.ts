import { Client, ClientOptions } from '@elastic/elasticsearch';

export interface EsConnectionConfig {
    node: string;
    apiKey?: string;
    username?: string;
    password?: string;
    maxRetries: number;
    requestTimeoutMs: number;
}

const authFrom = (config: EsConnectionConfig): ClientOptions['auth'] => {
    if (config.apiKey) {
        return { apiKey: config.apiKey };
    }
    if (config.username && config.password) {
        return { username: config.username, password: config.password };
    }
    return undefined;
};

// Retries on connection errors and 502/503/504 are handled by the client itself.
export const createEsClient = (config: EsConnectionConfig): Client => {
    return new Client({
        node: config.node,
        auth: authFrom(config),
        maxRetries: config.maxRetries,
        requestTimeout: config.requestTimeoutMs
    });
};
