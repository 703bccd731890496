/**
 * Connection Registry
 *
 * The set of live client connections, keyed by connection id. Owned by the
 * server handle that created it; there is no module-level registry.
 */

import type { Connection, ConnectionStateKind } from './types.js';

export class ConnectionRegistry {
    private readonly connections = new Map<string, Connection>();

    register(connection: Connection): void {
        if (this.connections.has(connection.id)) {
            throw new Error(`Connection ${connection.id} is already registered`);
        }
        this.connections.set(connection.id, connection);
    }

    /**
     * Remove a connection. Returns false when it was not registered.
     */
    unregister(id: string): boolean {
        return this.connections.delete(id);
    }

    get(id: string): Connection | undefined {
        return this.connections.get(id);
    }

    has(id: string): boolean {
        return this.connections.has(id);
    }

    get size(): number {
        return this.connections.size;
    }

    values(): IterableIterator<Connection> {
        return this.connections.values();
    }

    /**
     * Count connections by authentication state
     */
    countByState(): Record<ConnectionStateKind, number> {
        const counts: Record<ConnectionStateKind, number> = {
            AWAITING_USERNAME: 0,
            AWAITING_PASSWORD: 0,
            AUTHENTICATED: 0,
        };
        for (const connection of this.connections.values()) {
            counts[connection.state.kind]++;
        }
        return counts;
    }
}
