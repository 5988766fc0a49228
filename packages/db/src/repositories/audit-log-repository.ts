import {
  type AuditAction,
  type AuditEvent,
  type AuditFilters,
  type AuditLogRepository,
  type AuditStatus,
  type AuditValues,
  type NewAuditEvent,
  type Page,
  type Pagination,
} from '@emerald/domain';
import { sqlClient } from '../client';
import { firstRow } from './user-repository';

type AuditRow = {
  id: string;
  user_id: string | null;
  action: AuditAction;
  entity_type: string;
  entity_id: string | null;
  old_values: AuditValues | null;
  new_values: AuditValues | null;
  description: string | null;
  client_ip: string | null;
  user_agent: string | null;
  correlation_id: string | null;
  status: AuditStatus;
  error_message: string | null;
  extra_metadata: AuditValues | null;
  created_at: Date;
};

const AUDIT_COLUMNS = `id, user_id, action, entity_type, entity_id, old_values, new_values, description,
  client_ip, user_agent, correlation_id, status, error_message, extra_metadata, created_at`;

/**
 * Append-only. There is no update path here and the table's trigger rejects
 * one, so a recorded event can only disappear through the retention purge.
 */
export class PgAuditLogRepository implements AuditLogRepository {
  async insert(tx: unknown, event: NewAuditEvent): Promise<AuditEvent> {
    const result = await sqlClient(tx).query<AuditRow>(
      `INSERT INTO audit_logs (id, user_id, action, entity_type, entity_id, old_values, new_values,
         description, client_ip, user_agent, correlation_id, status, error_message, extra_metadata)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14)
       RETURNING ${AUDIT_COLUMNS}`,
      [
        event.id,
        event.userId,
        event.action,
        event.entityType,
        event.entityId,
        toJsonb(event.oldValues),
        toJsonb(event.newValues),
        event.description,
        event.clientIp,
        event.userAgent,
        event.correlationId,
        event.status,
        event.errorMessage,
        toJsonb(event.extraMetadata),
      ],
    );
    return mapAuditRow(firstRow(result.rows));
  }

  async list(
    tx: unknown,
    query: { userId?: string; filters: AuditFilters; pagination: Pagination },
  ): Promise<Page<AuditEvent>> {
    const { where, values } = buildAuditWhere(query.userId, query.filters);
    const client = sqlClient(tx);

    const count = await client.query<{ total: string }>(
      `SELECT COUNT(*) AS total FROM audit_logs ${where}`,
      values,
    );

    const pageValues = [...values, query.pagination.limit, query.pagination.offset];
    const result = await client.query<AuditRow>(
      `SELECT ${AUDIT_COLUMNS} FROM audit_logs ${where}
       ORDER BY created_at DESC, id DESC
       LIMIT $${values.length + 1} OFFSET $${values.length + 2}`,
      pageValues,
    );

    return {
      items: result.rows.map(mapAuditRow),
      total: Number(count.rows[0]?.total ?? 0),
    };
  }

  async deleteOlderThan(tx: unknown, days: number): Promise<number> {
    const result = await sqlClient(tx).query(
      `DELETE FROM audit_logs WHERE created_at < NOW() - make_interval(days => $1)`,
      [days],
    );
    return result.rowCount ?? 0;
  }
}

export function buildAuditWhere(
  userId: string | undefined,
  filters: AuditFilters,
): { where: string; values: unknown[] } {
  const conditions: string[] = [];
  const values: unknown[] = [];

  const add = (sql: (placeholder: string) => string, value: unknown): void => {
    values.push(value);
    conditions.push(sql(`$${values.length}`));
  };

  if (userId !== undefined) add((p) => `user_id = ${p}`, userId);
  if (filters.action !== undefined) add((p) => `action = ${p}`, filters.action);
  if (filters.entityType !== undefined) add((p) => `entity_type = ${p}`, filters.entityType);
  if (filters.status !== undefined) add((p) => `status = ${p}`, filters.status);
  if (filters.dateFrom !== undefined) add((p) => `created_at >= ${p}`, filters.dateFrom);
  if (filters.dateTo !== undefined) add((p) => `created_at <= ${p}`, filters.dateTo);

  return {
    where: conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '',
    values,
  };
}

function toJsonb(values: AuditValues | null): string | null {
  return values === null ? null : JSON.stringify(values);
}

function mapAuditRow(row: AuditRow): AuditEvent {
  return {
    id: row.id,
    userId: row.user_id,
    action: row.action,
    entityType: row.entity_type,
    entityId: row.entity_id,
    oldValues: row.old_values,
    newValues: row.new_values,
    description: row.description,
    clientIp: row.client_ip,
    userAgent: row.user_agent,
    correlationId: row.correlation_id,
    status: row.status,
    errorMessage: row.error_message,
    extraMetadata: row.extra_metadata,
    createdAt: row.created_at,
  };
}
