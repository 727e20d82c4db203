import { afterEach, describe, expect, it, vi } from "vitest";
import type { NotificationRecord } from "../../src/data/repositories/notificationRepository.js";
import { NotificationHub } from "../../src/realtime/notificationHub.js";
import {
  NOTIFICATION_NAMESPACE,
  registerNotificationNamespace
} from "../../src/realtime/notificationNamespace.js";
import { buildNotificationRecord } from "../factories/builders.js";
import {
  ListenPermissionError,
  createTestClient,
  disconnectClient,
  startSocketTestServer,
  waitForEvent,
  type SocketTestServer,
  type TestClient
} from "../support/socket.js";

function record(sequence: number, userId: string): NotificationRecord {
  return buildNotificationRecord({ sequence_id: sequence, user_id: userId });
}

let server: SocketTestServer | undefined;
let hub: NotificationHub;
const clients: TestClient[] = [];

async function start(): Promise<SocketTestServer | null> {
  hub = new NotificationHub({ bufferSize: 8, overflowPolicy: "drop-oldest" });
  try {
    server = await startSocketTestServer((io) => {
      registerNotificationNamespace(io, { hub });
    });
    return server;
  } catch (err) {
    if (err instanceof ListenPermissionError) return null;
    throw err;
  }
}

async function connect(srv: SocketTestServer, auth: Record<string, string>) {
  const client = await createTestClient(srv, { namespace: NOTIFICATION_NAMESPACE, auth });
  clients.push(client);
  return client;
}

function notificationsOf(client: TestClient) {
  return client.events.filter((entry) => entry.event === "notification").map((e) => e.args[0]);
}

describe("notification namespace", () => {
  afterEach(async () => {
    await Promise.all(clients.splice(0).map(disconnectClient));
    hub.close();
    if (server) {
      await server.close();
      server = undefined;
    }
  });

  it("delivers each subscriber only its own notifications", async () => {
    const srv = await start();
    if (!srv) return;

    const alice = await connect(srv, { userId: "A" });
    const bob = await connect(srv, { userId: "B" });
    expect(await waitForEvent(alice, "joined")).toEqual([{ userId: "A" }]);
    expect(await waitForEvent(bob, "joined")).toEqual([{ userId: "B" }]);
    await vi.waitFor(() => expect(hub.subscriberCount).toBe(2));

    hub.publish(record(1, "B"));
    hub.publish(record(2, "A"));
    hub.publish(record(3, "B"));

    await vi.waitFor(() => expect(notificationsOf(bob)).toHaveLength(2));
    await vi.waitFor(() => expect(notificationsOf(alice)).toHaveLength(1));
    expect(notificationsOf(alice)).toEqual([
      {
        id: "NF-002",
        sequence: 2,
        userId: "A",
        message: "Notification 2",
        metadata: null,
        read: false,
        createdAt: "2024-05-01T10:00:00.000Z"
      }
    ]);
    expect(notificationsOf(bob).map((dto) => JSON.stringify(dto))).toEqual([
      expect.stringContaining('"id":"NF-001"'),
      expect.stringContaining('"id":"NF-003"')
    ]);
  });

  it("accepts identity from handshake headers", async () => {
    const srv = await start();
    if (!srv) return;

    const client = await createTestClient(srv, {
      namespace: NOTIFICATION_NAMESPACE,
      headers: { "x-user-id": "U7", "x-user-role": "ROLE_USER" }
    });
    clients.push(client);
    expect(await waitForEvent(client, "joined")).toEqual([{ userId: "U7" }]);
  });

  it("rejects a handshake without an identity", async () => {
    const srv = await start();
    if (!srv) return;

    await expect(
      createTestClient(srv, { namespace: NOTIFICATION_NAMESPACE })
    ).rejects.toThrow("Missing caller identity");
    expect(hub.subscriberCount).toBe(0);
  });

  it("cancels the subscription on disconnect", async () => {
    const srv = await start();
    if (!srv) return;

    const client = await connect(srv, { userId: "A" });
    await waitForEvent(client, "joined");
    expect(hub.subscriberCount).toBe(1);

    client.socket.disconnect();

    await vi.waitFor(() => expect(hub.subscriberCount).toBe(0));
  });

  it("disconnects sockets that arrive after the hub has shut down", async () => {
    const srv = await start();
    if (!srv) return;
    hub.close();

    const client = await connect(srv, { userId: "A" });

    await vi.waitFor(() => expect(client.socket.connected).toBe(false));
    expect(client.events.map((entry) => entry.event)).not.toContain("joined");
    expect(hub.subscriberCount).toBe(0);
  });
});
