import { cryptoRandomId } from '../crypto';

/**
 * Represents a friend request from one player to another.
 */
export type FriendRequest = {
    requestId: string;
    senderId: string;
    recipientId: string;
    status: 'pending' | 'accepted' | 'rejected';
    createdAt: string;
};

export interface FriendStore {
    createRequest(senderId: string, recipientId: string, createdAt: Date): FriendRequest;

    getRequest(requestId: string): FriendRequest | undefined;

    resolveRequest(requestId: string, status: 'accepted' | 'rejected'): FriendRequest | undefined;

    hasPendingBetween(playerA: string, playerB: string): boolean;

    getPendingForRecipient(recipientId: string): FriendRequest[];

    areFriends(playerA: string, playerB: string): boolean;

    listFriends(playerId: string): string[];

    removeFriendship(playerA: string, playerB: string): boolean;

    /** Drops every request and friendship naming the player. */
    removePlayer(playerId: string): void;
}

// Friendships are undirected: key = `${lowerId}|${higherId}`
function friendshipKey(playerA: string, playerB: string): string {
    return playerA < playerB ? `${playerA}|${playerB}` : `${playerB}|${playerA}`;
}

class InMemoryFriendStore implements FriendStore {
    private readonly requests = new Map<string, FriendRequest>();

    private readonly pendingByRecipient = new Map<string, string[]>();

    private readonly friendships = new Set<string>();

    createRequest(senderId: string, recipientId: string, createdAt: Date): FriendRequest {
        const request: FriendRequest = {
            requestId: `fr_` + cryptoRandomId(),
            senderId,
            recipientId,
            status: 'pending',
            createdAt: createdAt.toISOString(),
        };
        this.requests.set(request.requestId, request);
        const pending = this.pendingByRecipient.get(recipientId) ?? [];
        pending.push(request.requestId);
        this.pendingByRecipient.set(recipientId, pending);
        return { ...request };
    }

    getRequest(requestId: string): FriendRequest | undefined {
        const request = this.requests.get(requestId);
        return request ? { ...request } : undefined;
    }

    resolveRequest(requestId: string, status: 'accepted' | 'rejected'): FriendRequest | undefined {
        const request = this.requests.get(requestId);
        if (!request || request.status !== 'pending') return undefined;

        request.status = status;
        this.removePending(request.recipientId, requestId);
        if (status === 'accepted') {
            this.friendships.add(friendshipKey(request.senderId, request.recipientId));
        }
        return { ...request };
    }

    hasPendingBetween(playerA: string, playerB: string): boolean {
        const pendingFrom = (senderId: string, recipientId: string) =>
            (this.pendingByRecipient.get(recipientId) ?? []).some(id => this.requests.get(id)?.senderId === senderId);
        return pendingFrom(playerA, playerB) || pendingFrom(playerB, playerA);
    }

    getPendingForRecipient(recipientId: string): FriendRequest[] {
        const requestIds = this.pendingByRecipient.get(recipientId) ?? [];
        const out: FriendRequest[] = [];
        for (const id of requestIds) {
            const request = this.requests.get(id);
            if (request) out.push({ ...request });
        }
        return out;
    }

    areFriends(playerA: string, playerB: string): boolean {
        return this.friendships.has(friendshipKey(playerA, playerB));
    }

    listFriends(playerId: string): string[] {
        const out: string[] = [];
        this.friendships.forEach(key => {
            const [first, second] = key.split('|');
            if (first === playerId && second !== undefined) out.push(second);
            else if (second === playerId && first !== undefined) out.push(first);
        });
        return out;
    }

    removeFriendship(playerA: string, playerB: string): boolean {
        return this.friendships.delete(friendshipKey(playerA, playerB));
    }

    removePlayer(playerId: string): void {
        this.pendingByRecipient.delete(playerId);
        this.requests.forEach((request, requestId) => {
            if (request.senderId !== playerId && request.recipientId !== playerId) return;
            this.requests.delete(requestId);
            this.removePending(request.recipientId, requestId);
        });
        for (const friendId of this.listFriends(playerId)) {
            this.removeFriendship(playerId, friendId);
        }
    }

    private removePending(recipientId: string, requestId: string): void {
        const pending = this.pendingByRecipient.get(recipientId)?.filter(id => id !== requestId);
        if (pending) {
            this.pendingByRecipient.set(recipientId, pending);
        }
    }
}

export function createInMemoryFriendStore(): FriendStore {
    return new InMemoryFriendStore();
}
