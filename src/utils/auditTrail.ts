import { AuditEntry, AuditStep } from '../types/output.js';
import { Clock, systemClock } from './clock.js';

export function createAuditEntry(step: AuditStep, details: string, clock: Clock = systemClock): AuditEntry {
    return {
        step,
        timestamp: clock.now().toISOString(),
        details,
    };
}
