// src/kernel-core/L5/Audit.ts
import { z } from 'zod';
import { hash, canonicalize } from '../L0/Crypto.js';
import type { AccessEvent, Evidence, Principal } from '../L0/Ontology.js';
import type { IStateStore } from '../L2/State.js';

export const GENESIS_EVIDENCE_ID = '0000000000000000000000000000000000000000000000000000000000000000';

const principal = z.string().min(1);
const role = z.number().int().nonnegative();

export const AccessEventSchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('INITIALIZED'), by: principal }),
    z.object({ type: z.literal('OWNERSHIP_TRANSFERRED'), previousOwner: principal, newOwner: principal }),
    z.object({ type: z.literal('OWNERSHIP_HANDOVER_REQUESTED'), pendingOwner: principal, expiresAt: z.number().int() }),
    z.object({ type: z.literal('OWNERSHIP_HANDOVER_CANCELED'), pendingOwner: principal }),
    z.object({ type: z.literal('ROLE_GRANTED'), principal, role, grantedBy: principal }),
    z.object({ type: z.literal('ROLE_REVOKED'), principal, role, revokedBy: principal }),
    z.object({
        type: z.literal('ROLE_ADMIN_CHANGED'),
        role,
        previousAdminRole: role,
        newAdminRole: role,
        changedBy: principal
    })
]);

/**
 * Hash-chained log of committed events for one object.
 *
 * Evidence is sealed against the current tip while a transaction is open and only
 * becomes the tip once the store has accepted it (`advance`).
 */
export class AuditLog {
    private tip: Evidence | null;

    constructor(private objectId: string, private store: IStateStore) {
        this.tip = store.getLatest(objectId);
    }

    public seal(operation: string, caller: Principal, events: readonly AccessEvent[], timestamp: number): Evidence[] {
        const sealed: Evidence[] = [];
        let previous = this.tip;

        for (const event of events) {
            const previousEvidenceId = previous ? previous.evidenceId : GENESIS_EVIDENCE_ID;
            const sequence = previous ? previous.sequence + 1 : 0;
            const evidence: Evidence = {
                evidenceId: calculateHash(previousEvidenceId, this.objectId, sequence, operation, caller, event, timestamp),
                previousEvidenceId,
                objectId: this.objectId,
                sequence,
                operation,
                caller,
                event,
                timestamp
            };
            Object.freeze(evidence);
            sealed.push(evidence);
            previous = evidence;
        }

        return sealed;
    }

    public advance(committed: readonly Evidence[]): void {
        const last = committed[committed.length - 1];
        if (last) this.tip = last;
    }

    /** Adopts a tip committed elsewhere. */
    public reset(tip: Evidence | null): void {
        this.tip = tip;
    }

    public getTip(): Evidence | null {
        return this.tip;
    }

    public getHistory(): Evidence[] {
        return this.store.getHistory(this.objectId);
    }

    public verifyChain(): boolean {
        return verifyChain(this.getHistory());
    }
}

export function verifyChain(history: readonly Evidence[]): boolean {
    let prev = GENESIS_EVIDENCE_ID;
    let expectedSequence = 0;

    for (const entry of history) {
        if (entry.previousEvidenceId !== prev) return false;
        if (entry.sequence !== expectedSequence) return false;

        const h = calculateHash(prev, entry.objectId, entry.sequence, entry.operation, entry.caller, entry.event, entry.timestamp);
        if (h !== entry.evidenceId) return false;

        prev = entry.evidenceId;
        expectedSequence++;
    }
    return true;
}

function calculateHash(
    prevHash: string,
    objectId: string,
    sequence: number,
    operation: string,
    caller: Principal,
    event: AccessEvent,
    timestamp: number
): string {
    // [PreviousHash, ObjectID, Sequence, Operation, Caller, EventHash, Timestamp]
    const canonical: [string, string, number, string, string, string, number] = [
        prevHash,
        objectId,
        sequence,
        operation,
        caller,
        hash(canonicalize(event)),
        timestamp
    ];
    return hash(canonicalize(canonical));
}
