import { formatNotificationId, type NotificationDto } from "@tasknotify/shared";
import { type DbClient, query } from "../db.js";

export type NotificationRecord = {
  sequence_id: number;
  user_id: string;
  message: string;
  is_read: boolean;
  metadata: string | null;
  created_at: Date;
};

export type NewNotification = {
  user_id: string;
  message: string;
  metadata: string | null;
  created_at: Date;
};

// BIGSERIAL comes back from node-postgres as a string.
type NotificationRow = Omit<NotificationRecord, "sequence_id" | "created_at"> & {
  sequence_id: string | number;
  created_at: Date | string;
};

const RETURNED_COLUMNS = `sequence_id, user_id, message, is_read, metadata, created_at`;

function toRecord(row: NotificationRow): NotificationRecord {
  return {
    sequence_id: Number(row.sequence_id),
    user_id: row.user_id,
    message: row.message,
    is_read: Boolean(row.is_read),
    metadata: row.metadata ?? null,
    created_at: row.created_at instanceof Date ? row.created_at : new Date(row.created_at)
  };
}

export function toNotificationDto(record: NotificationRecord): NotificationDto {
  return {
    id: formatNotificationId(record.sequence_id),
    sequence: record.sequence_id,
    userId: record.user_id,
    message: record.message,
    metadata: record.metadata,
    read: record.is_read,
    createdAt: record.created_at.toISOString()
  };
}

/**
 * Inserts a notification and returns it with the database-assigned sequence.
 * The sequence comes from the table's BIGSERIAL in the same statement, so
 * concurrent writers never need to coordinate.
 */
export async function insertNotification(
  client: DbClient,
  input: NewNotification
): Promise<NotificationRecord> {
  const { rows } = await query<NotificationRow>(
    client,
    `INSERT INTO notifications (user_id, message, is_read, metadata, created_at)
     VALUES ($1, $2, FALSE, $3, $4::timestamptz)
     RETURNING ${RETURNED_COLUMNS}`,
    [input.user_id, input.message, input.metadata, input.created_at.toISOString()]
  );
  const row = rows[0];
  if (!row) throw new Error("Notification insert returned no row");
  return toRecord(row);
}

export async function listNotificationsForUser(
  client: DbClient,
  userId: string
): Promise<NotificationRecord[]> {
  const { rows } = await query<NotificationRow>(
    client,
    `SELECT ${RETURNED_COLUMNS}
     FROM notifications
     WHERE user_id = $1
     ORDER BY sequence_id DESC`,
    [userId]
  );
  return rows.map(toRecord);
}

export async function listAllNotifications(client: DbClient): Promise<NotificationRecord[]> {
  const { rows } = await query<NotificationRow>(
    client,
    `SELECT ${RETURNED_COLUMNS}
     FROM notifications
     ORDER BY sequence_id DESC`
  );
  return rows.map(toRecord);
}

export async function getNotificationBySequence(
  client: DbClient,
  sequence: number
): Promise<NotificationRecord | null> {
  const { rows } = await query<NotificationRow>(
    client,
    `SELECT ${RETURNED_COLUMNS} FROM notifications WHERE sequence_id = $1`,
    [sequence]
  );
  return rows[0] ? toRecord(rows[0]) : null;
}

// Setting the flag on an already-read row is a no-op update, not an error.
export async function markNotificationRead(
  client: DbClient,
  sequence: number
): Promise<NotificationRecord | null> {
  const { rows } = await query<NotificationRow>(
    client,
    `UPDATE notifications
     SET is_read = TRUE
     WHERE sequence_id = $1
     RETURNING ${RETURNED_COLUMNS}`,
    [sequence]
  );
  return rows[0] ? toRecord(rows[0]) : null;
}

export type SequenceStore = {
  append(candidate: NewNotification): Promise<NotificationRecord>;
  listByRecipient(userId: string): Promise<NotificationRecord[]>;
  listAll(): Promise<NotificationRecord[]>;
  get(sequence: number): Promise<NotificationRecord | null>;
  markRead(sequence: number): Promise<NotificationRecord | null>;
};

export function createSequenceStore(client: DbClient): SequenceStore {
  return {
    append: (candidate) => insertNotification(client, candidate),
    listByRecipient: (userId) => listNotificationsForUser(client, userId),
    listAll: () => listAllNotifications(client),
    get: (sequence) => getNotificationBySequence(client, sequence),
    markRead: (sequence) => markNotificationRead(client, sequence)
  };
}
