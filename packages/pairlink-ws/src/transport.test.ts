// End-to-end tests for paired WebSocket connectors on loopback.

import net from "node:net";
import { once } from "node:events";
import { describe, it, expect, vi, afterEach } from "vitest";
import WebSocket, { WebSocketServer } from "ws";
import {
  Connector,
  type ConnectorOptions,
  type DialOptions,
  type LinkChannel,
  type LinkError,
  type LinkListener,
  type ListenOptions,
  MemoryLogger,
} from "@pairlink/core";
import { WsBinding, createWsConnector, wsUrl } from "./transport.ts";

const FAST: ConnectorOptions["config"] = {
  listenHost: "127.0.0.1",
  dialAttemptTimeoutMs: 500,
  dialRetryDelayMs: 10,
  connectWaitMs: 3000,
  joinTimeoutMs: 500,
  closeDrainMs: 0,
};

async function freePort(): Promise<number> {
  const server = net.createServer();
  server.listen(0, "127.0.0.1");
  await once(server, "listening");
  const address = server.address();
  const port = typeof address === "object" && address !== null ? address.port : 0;
  server.close();
  await once(server, "close");
  return port;
}

/** WsBinding that remembers every channel it hands out. */
class RecordingBinding extends WsBinding {
  readonly channels: LinkChannel[] = [];

  override listen(options: ListenOptions, onChannel: (channel: LinkChannel) => void): Promise<LinkListener> {
    return super.listen(options, (channel) => {
      this.channels.push(channel);
      onChannel(channel);
    });
  }

  override async dial(options: DialOptions): Promise<LinkChannel> {
    const channel = await super.dial(options);
    this.channels.push(channel);
    return channel;
  }

  openChannels(): LinkChannel[] {
    return this.channels.filter((c) => c.isOpen);
  }
}

const cleanup: Array<() => Promise<void> | void> = [];

function wsConnector(options: ConnectorOptions = {}): Connector {
  const connector = createWsConnector({
    logger: new MemoryLogger(),
    ...options,
    config: { ...FAST, ...options.config },
  });
  cleanup.push(() => connector.close());
  return connector;
}

/** A WebSocket server that accepts connections and ignores them. */
async function sinkServer(): Promise<number> {
  const server = new WebSocketServer({ port: 0, host: "127.0.0.1" });
  await once(server, "listening");
  cleanup.push(() => {
    for (const client of server.clients) client.terminate();
    server.close();
  });
  const address = server.address();
  return typeof address === "object" && address !== null ? address.port : 0;
}

async function rawClient(port: number): Promise<WebSocket> {
  const ws = new WebSocket(wsUrl("127.0.0.1", port));
  ws.on("error", () => {});
  cleanup.push(() => {
    ws.terminate();
  });
  await once(ws, "open");
  return ws;
}

afterEach(async () => {
  for (const fn of cleanup.splice(0)) await fn();
});

async function linkPair(a: Connector, b: Connector): Promise<void> {
  const [portA, portB] = [await freePort(), await freePort()];
  await a.connect(portA, portB);
  await b.connect(portB, portA);
  await vi.waitFor(() => {
    expect(a.isConnected).toBe(true);
    expect(b.isConnected).toBe(true);
  });
}

describe("wsUrl", () => {
  it("brackets IPv6 literals", () => {
    expect(wsUrl("127.0.0.1", 9000)).toBe("ws://127.0.0.1:9000");
    expect(wsUrl("::1", 9000)).toBe("ws://[::1]:9000");
    expect(wsUrl("[::1]", 9000)).toBe("ws://[::1]:9000");
  });
});

describe("WebSocket connector", () => {
  it("links two peers and exchanges messages both ways", async () => {
    const a = wsConnector();
    const b = wsConnector();
    await linkPair(a, b);

    await a.send("hello", new Uint8Array([0x01, 0x02]));
    expect(await b.receive()).toEqual({ tag: "hello", payload: new Uint8Array([0x01, 0x02]) });

    await b.send("world");
    expect(await a.receive()).toEqual({ tag: "world" });
    expect(a.transport).toBe("ws");
  });

  it("connects when both peers start at once", async () => {
    const [portA, portB] = [await freePort(), await freePort()];
    const a = wsConnector();
    const b = wsConnector();

    await Promise.all([a.connect(portA, portB), b.connect(portB, portA)]);

    await a.send("ping");
    expect(await b.receive()).toEqual({ tag: "ping" });
  });

  it("connects when the second peer starts much later", async () => {
    const [portA, portB] = [await freePort(), await freePort()];
    const a = wsConnector();
    const b = wsConnector();

    await b.connect(portB, portA);
    await new Promise((resolve) => setTimeout(resolve, 300));
    await a.connect(portA, portB);

    await b.send("late");
    expect(await a.receive()).toEqual({ tag: "late" });
  });

  it("keeps one inbound and one outbound socket per side", async () => {
    const bindingA = new RecordingBinding();
    const bindingB = new RecordingBinding();
    const a = new Connector(bindingA, { logger: new MemoryLogger(), config: FAST });
    const b = new Connector(bindingB, { logger: new MemoryLogger(), config: FAST });
    cleanup.push(() => a.close(), () => b.close());

    await linkPair(a, b);

    await vi.waitFor(() => {
      expect(bindingA.openChannels()).toHaveLength(2);
      expect(bindingB.openChannels()).toHaveLength(2);
    });
  });

  it("delivers 1000 messages in order, including empty and 1 MiB payloads", async () => {
    const a = wsConnector();
    const b = wsConnector();
    await linkPair(a, b);

    const payloadFor = (i: number): Uint8Array | undefined => {
      if (i % 250 === 0) return new Uint8Array(1024 * 1024).fill(i % 256);
      if (i % 3 === 0) return undefined;
      return new Uint8Array([i & 0xff, i >> 8]);
    };

    const sending = Promise.all(
      Array.from({ length: 1000 }, (_, i) => a.send(`m${i}`, payloadFor(i))),
    );

    for (let i = 0; i < 1000; i++) {
      const message = await b.receive();
      expect(message.tag).toBe(`m${i}`);
      expect(message.payload).toEqual(payloadFor(i));
    }
    await sending;
  });

  it("refuses to send a part larger than the maximum", async () => {
    const a = wsConnector({ config: { maxFrameSize: 1024 } });
    const b = wsConnector({ config: { maxFrameSize: 1024 } });
    await linkPair(a, b);

    await expect(a.send("big", new Uint8Array(2048))).rejects.toMatchObject({ kind: "framing" });
    expect(a.isConnected).toBe(true);
  });

  it("loses the link when the peer sends more than the maximum", async () => {
    const lost: LinkError[] = [];
    const a = wsConnector();
    const b = wsConnector({
      config: { maxFrameSize: 1024 },
      onConnectionLost: (e) => lost.push(e),
    });
    await linkPair(a, b);

    await a.send("big", new Uint8Array(4096));

    await vi.waitFor(() => expect(lost).toHaveLength(1));
    expect(lost[0].kind).toBe("framing");
    await vi.waitFor(() => expect(a.isLost).toBe(true));
  });

  it("treats a payload part without a tag part as a framing error", async () => {
    const lost: LinkError[] = [];
    const listenPort = await freePort();
    const a = wsConnector({ onConnectionLost: (e) => lost.push(e) });
    await a.connect(listenPort, await sinkServer());

    const raw = await rawClient(listenPort);
    await vi.waitFor(() => expect(a.isConnected).toBe(true));

    raw.send("valid");
    raw.send(new Uint8Array([7]));
    raw.send(new Uint8Array([1, 2, 3]));

    expect(await a.receive()).toEqual({ tag: "valid", payload: new Uint8Array([7]) });
    await vi.waitFor(() => expect(lost).toHaveLength(1));
    expect(lost[0].kind).toBe("framing");
    await expect(a.receive()).rejects.toBe(lost[0]);
  });

  it("fails connect when the listening port is taken", async () => {
    const taken = await sinkServer();
    const a = wsConnector();

    await expect(a.connect(taken, await freePort())).rejects.toMatchObject({ kind: "io" });
    expect(a.state).toBe("closed");
  });

  it("stays unconnected until both directions exist", async () => {
    const a = wsConnector({ config: { connectWaitMs: 200 } });
    await a.connect(await freePort(), await sinkServer());

    await expect(a.send("half")).rejects.toMatchObject({ kind: "not-connected" });
    expect(a.state).toBe("establishing");
  });

  it("releases a pending receive when closed", async () => {
    const a = wsConnector();
    await a.connect(await freePort(), await freePort());

    const receiving = a.receive();
    await a.close();
    await expect(receiving).rejects.toMatchObject({ kind: "closed" });
  });

  it("reports a peer disconnect", async () => {
    const lost: LinkError[] = [];
    const a = wsConnector({ onConnectionLost: (e) => lost.push(e) });
    const b = wsConnector();
    await linkPair(a, b);

    await b.close();

    await vi.waitFor(() => expect(lost).toHaveLength(1));
    expect(lost[0].kind).toBe("io");
    expect(a.isConnected).toBe(false);
    await expect(a.send("gone")).rejects.toMatchObject({ kind: "io" });
  });
});
