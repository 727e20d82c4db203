import {
  enforceIngestionTransition,
  isTerminalIngestionState,
  parseNotificationRequest,
  type IngestionState,
  type IngestionStateTransition,
  type NotificationRequest
} from "@tasknotify/shared";
import type { ForwardedAuth } from "../auth/middleware.js";
import { type Caller, hasProducerAccess } from "../auth/roles.js";
import type {
  NewNotification,
  NotificationRecord,
  SequenceStore
} from "../data/repositories/notificationRepository.js";
import { composeMessage, composeMetadata } from "../domain/notificationMessage.js";
import { AppError, forbiddenError, persistenceError } from "../errors.js";
import { enrichEvent, type EnrichmentClients } from "../lib/enrichment.js";
import { log } from "../logger.js";
import type { NotificationHub, PublishResult } from "../realtime/notificationHub.js";

export const INGEST_DENIED = "Not authorized to create notifications.";

export type PipelineDeps = {
  store: SequenceStore;
  hub: NotificationHub;
  enrichment: EnrichmentClients;
  now?: () => Date;
  onTransition?: (transition: IngestionStateTransition) => void;
};

class IngestionRun {
  private state: IngestionState = "RECEIVED";

  constructor(private readonly onTransition?: (t: IngestionStateTransition) => void) {}

  advance(to: IngestionState) {
    const from = this.state;
    this.state = enforceIngestionTransition(from, to);
    this.onTransition?.({ from, to: this.state });
  }

  fail() {
    if (isTerminalIngestionState(this.state)) return;
    this.advance("FAILED");
  }
}

/**
 * Turns a producer event into a persisted, broadcast notification.
 * Authorization and validation run before any outbound call; a record is only
 * published once the store has accepted it.
 */
export class NotificationPipeline {
  private readonly now: () => Date;

  constructor(private readonly deps: PipelineDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async ingest(
    body: unknown,
    caller: Caller | undefined,
    forwarded: ForwardedAuth
  ): Promise<NotificationRecord> {
    const receivedAt = this.now();
    const run = new IngestionRun(this.deps.onTransition);
    try {
      run.advance("AUTHORIZING");
      const request = this.admit(body, caller);

      run.advance("ENRICHING");
      const enrichment = await enrichEvent(
        this.deps.enrichment,
        {
          taskId: request.taskId,
          recipientUserId: request.recipientUserId,
          projectId: request.projectId
        },
        forwarded
      );

      run.advance("COMPOSING");
      const candidate: NewNotification = {
        user_id: request.recipientUserId,
        message: composeMessage(request, enrichment),
        metadata: composeMetadata(request, enrichment),
        created_at: request.occurredAt ?? receivedAt
      };

      run.advance("PERSISTING");
      const record = await this.persist(candidate, request);

      run.advance("BROADCASTING");
      const published = this.broadcast(record);

      run.advance("COMPLETED");
      log({
        level: "info",
        msg: "notification_created",
        sequence_id: record.sequence_id,
        recipient_id: record.user_id,
        event_type: request.eventType,
        live_deliveries: published?.delivered ?? 0
      });
      return record;
    } catch (err) {
      run.fail();
      throw err;
    }
  }

  private admit(body: unknown, caller: Caller | undefined): NotificationRequest {
    if (!hasProducerAccess(caller)) {
      log({
        level: "warn",
        msg: "notification_ingest_denied",
        caller_id: caller?.subjectId,
        caller_role: caller?.role
      });
      throw forbiddenError(INGEST_DENIED);
    }
    const parsed = parseNotificationRequest(body);
    if (!parsed.ok) {
      throw new AppError("VALIDATION_ERROR", 400, "Invalid notification request", {
        fields: parsed.issues.map((issue) => issue.field),
        issues: parsed.issues
      });
    }
    return parsed.value;
  }

  private async persist(
    candidate: NewNotification,
    request: NotificationRequest
  ): Promise<NotificationRecord> {
    try {
      return await this.deps.store.append(candidate);
    } catch (err) {
      log({
        level: "error",
        msg: "notification_persist_failed",
        recipient_id: candidate.user_id,
        event_type: request.eventType,
        task_id: request.taskId,
        project_id: request.projectId,
        error: err instanceof Error ? err.message : String(err),
        error_stack: err instanceof Error ? err.stack : undefined
      });
      throw persistenceError("append");
    }
  }

  // The record is already durable here; live delivery is best effort.
  private broadcast(record: NotificationRecord): PublishResult | null {
    try {
      return this.deps.hub.publish(record);
    } catch (err) {
      log({
        level: "error",
        msg: "notification_publish_failed",
        sequence_id: record.sequence_id,
        recipient_id: record.user_id,
        error: err instanceof Error ? err.message : String(err)
      });
      return null;
    }
  }
}
