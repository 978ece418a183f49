/**
 * Audit Log Service
 *
 * Writes claim-audit events to the audit_log table so every model call can be
 * traced to the model that ran and the analysis it produced (by hash, never
 * by content).
 *
 * audit_log columns: id, claim_id, event_type, actor_type, actor_id, detail_json, created_at
 */
import { randomUUID } from 'crypto';
import { sha256, type AuditResult } from '@claimaudit/shared';
import { db } from '../db/connection.js';
import { logger } from '../logger.js';

export type ActorType = 'SYSTEM' | 'USER' | 'LLM';

export interface AuditEventInput {
  claimId?: number;
  eventType: string;
  actorType: ActorType;
  actorId?: string;
  detail: Record<string, unknown>;
}

export interface AuditEventRow {
  id: string;
  claim_id: number | null;
  event_type: string;
  actor_type: ActorType;
  actor_id: string | null;
  detail_json: string | Record<string, unknown>;
  created_at: Date | string;
}

export interface AuditEvent {
  id: string;
  claimId: number | null;
  eventType: string;
  actorType: ActorType;
  actorId: string | null;
  detail: unknown;
  createdAt: string;
}

/**
 * Insert one event. Failures are logged and swallowed so a broken audit_log
 * table never fails the request that produced the event.
 */
export async function logAuditEvent(event: AuditEventInput): Promise<void> {
  try {
    await db('audit_log').insert({
      id: randomUUID(),
      claim_id: event.claimId ?? null,
      event_type: event.eventType,
      actor_type: event.actorType,
      actor_id: event.actorId ?? null,
      detail_json: JSON.stringify(event.detail),
      created_at: new Date(),
    });
  } catch (err) {
    logger.warn({ err, eventType: event.eventType, claimId: event.claimId }, 'Failed to write audit log event');
  }
}

export async function logAuditCompleted(result: AuditResult, userId?: string): Promise<void> {
  return logAuditEvent({
    claimId: result.claimId,
    eventType: 'AUDIT_COMPLETED',
    actorType: 'LLM',
    actorId: result.modelUsed,
    detail: {
      requestedBy: userId ?? null,
      modelUsed: result.modelUsed,
      requestedModelId: result.requestedModelId,
      fallbackUsed: result.fallbackUsed,
      fraudScore: result.fraudScore,
      success: result.success,
      promptLength: result.promptLength,
      analysisHash: sha256(result.analysisText),
    },
  });
}

export async function logAuditFailed(
  claimId: number,
  error: { code: string; message: string },
  userId?: string,
): Promise<void> {
  return logAuditEvent({
    claimId,
    eventType: 'AUDIT_FAILED',
    actorType: 'SYSTEM',
    actorId: userId,
    detail: { code: error.code, message: error.message },
  });
}

/**
 * Audit events for a claim, oldest first.
 */
export async function getAuditTrail(claimId: number): Promise<AuditEvent[]> {
  const rows = await db('audit_log')
    .where({ claim_id: claimId })
    .orderBy('created_at', 'asc')
    .select<AuditEventRow[]>('*');

  return rows.map((row) => ({
    id: row.id,
    claimId: row.claim_id,
    eventType: row.event_type,
    actorType: row.actor_type,
    actorId: row.actor_id,
    // mysql2 returns JSON columns parsed; other drivers return text
    detail: typeof row.detail_json === 'string' ? JSON.parse(row.detail_json) : row.detail_json,
    createdAt: row.created_at instanceof Date ? row.created_at.toISOString() : row.created_at,
  }));
}
