import { v4 as uuidv4 } from 'uuid';
import { SourceNotFoundError } from '@indexsync/search-index';
import { SourceSpec } from '../connectors';

export type NewSource = SourceSpec & {
    name: string;
    index: string;
};

export type RegisteredSource = NewSource & {
    id: string;
    createdAt: string;
};

export class SourceRegistry {
    private readonly sources = new Map<string, RegisteredSource>();

    register(source: NewSource): RegisteredSource {
        const registered: RegisteredSource = { ...source, id: uuidv4(), createdAt: new Date().toISOString() };
        this.sources.set(registered.id, registered);
        return registered;
    }

    get(id: string): RegisteredSource {
        const source = this.sources.get(id);
        if (!source) throw new SourceNotFoundError(id);
        return source;
    }

    list(): RegisteredSource[] {
        return [...this.sources.values()];
    }
}
