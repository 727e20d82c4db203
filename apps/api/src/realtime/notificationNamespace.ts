import type { Namespace, Server, Socket } from "socket.io";
import { readCallerHeaders } from "../auth/middleware.js";
import { type Caller, normalizeCallerRole } from "../auth/roles.js";
import { toNotificationDto } from "../data/repositories/notificationRepository.js";
import { AppError } from "../errors.js";
import { log } from "../logger.js";
import { waitForDrain } from "./backpressure.js";
import type { NotificationHub } from "./notificationHub.js";
import { subscribeForRecipient } from "./subscriptionFilter.js";

export const NOTIFICATION_NAMESPACE = "/notifications";

export type NotificationSocketData = {
  caller: Caller;
};

function readAuthField(socket: Socket, key: "userId" | "role"): string | undefined {
  const auth: unknown = socket.handshake.auth;
  if (!auth || typeof auth !== "object" || !(key in auth)) return undefined;
  const value: unknown = Reflect.get(auth, key);
  if (typeof value === "number") return String(value);
  if (typeof value === "string" && value.trim()) return value.trim();
  return undefined;
}

// Browsers cannot set custom handshake headers, so `auth` may carry the identity instead.
export function resolveSocketCaller(socket: Socket): Caller | null {
  const fromHeaders = readCallerHeaders(socket.handshake.headers);
  if (fromHeaders) return fromHeaders.caller;
  const userId = readAuthField(socket, "userId");
  if (!userId) return null;
  return { subjectId: userId, role: normalizeCallerRole(readAuthField(socket, "role")) };
}

export function registerNotificationNamespace(
  io: Server,
  opts: { hub: NotificationHub }
): Namespace {
  const nsp = io.of(NOTIFICATION_NAMESPACE);

  nsp.use((socket, next) => {
    const caller = resolveSocketCaller(socket);
    if (!caller) {
      next(new AppError("UNAUTHORIZED", 401, "Missing caller identity"));
      return;
    }
    const data: NotificationSocketData = { caller };
    socket.data = data;
    next();
  });

  nsp.on("connection", (socket) => {
    const data: NotificationSocketData = socket.data;
    const { caller } = data;
    if (opts.hub.isClosed) {
      log({
        level: "warn",
        msg: "notification_socket_rejected",
        recipient_id: caller.subjectId,
        reason: "hub_closed"
      });
      socket.disconnect(true);
      return;
    }
    const subscription = subscribeForRecipient(opts.hub, caller, caller.subjectId);
    socket.on("disconnect", () => subscription.cancel());
    socket.emit("joined", { userId: caller.subjectId });

    const pump = async () => {
      for await (const record of subscription) {
        socket.emit("notification", toNotificationDto(record));
        // Packets queue in the engine's write buffer while the transport is busy.
        if (socket.conn.writeBuffer.length > 0) {
          await waitForDrain(socket.conn, subscription);
        }
      }
    };
    pump()
      .catch((err: unknown) => {
        log({
          level: "error",
          msg: "notification_socket_failed",
          recipient_id: caller.subjectId,
          error: err instanceof Error ? err.message : String(err)
        });
      })
      .finally(() => {
        // The hub closed or dropped this subscriber; the client reconnects on its own.
        if (socket.connected) socket.disconnect(true);
      });
  });

  return nsp;
}
