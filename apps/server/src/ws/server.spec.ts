import { strict as assert } from "assert";
import { once } from "events";
import net from "net";
import request from "supertest";
import { createMemoryExchangeService } from "../services/ExchangeService";
import { memorySignatureGuard } from "../routes/auth";
import { createHttpWsServer } from "./server";

const UPGRADE_REQUEST = [
  "GET /ws/events HTTP/1.1",
  "Host: 127.0.0.1",
  "Upgrade: websocket",
  "Connection: Upgrade",
  "Sec-WebSocket-Key: dGhlIHNhbXBsZSBub25jZQ==",
  "Sec-WebSocket-Version: 13",
  "",
  "",
].join("\r\n");

function setup() {
  const exchange = createMemoryExchangeService({
    escrowAddress: "0x1000000000000000000000000000000000000001",
    treasuryAddress: "0x4000000000000000000000000000000000000004",
    rewardPoolAddress: "0x5000000000000000000000000000000000000005",
    feeRate: 0n,
    treasuryFeeRate: 0n,
    accrualPolicy: "checkpoint",
    defaultMeadPerSecond: 0n,
  });
  return createHttpWsServer(exchange, {
    claimSignature: memorySignatureGuard(),
    adminSecret: "test-secret",
  });
}

describe("event feed server", () => {
  it("should drop a client that sends a malformed frame and keep serving", async () => {
    const { httpServer, feed } = setup();
    httpServer.listen(0, "127.0.0.1");
    await once(httpServer, "listening");
    try {
      const address = httpServer.address();
      assert.ok(address !== null && typeof address === "object");

      const socket = net.connect(address.port, "127.0.0.1");
      socket.on("error", () => undefined);
      const handshake = new Promise<string>((resolve) => {
        socket.once("data", (chunk: Buffer) => resolve(chunk.toString("latin1")));
      });
      socket.write(UPGRADE_REQUEST);
      assert.match(await handshake, /^HTTP\/1\.1 101 /);
      assert.equal(feed.size, 1);

      // Client frames must be masked; this one is not.
      const closed = once(socket, "close");
      socket.write(Buffer.from([0x81, 0x02, 0x68, 0x69]));
      await closed;

      assert.equal(feed.size, 0);
      const res = await request(httpServer).get("/health/check");
      assert.equal(res.status, 200);
      assert.equal(res.body.status, "ok");
    } finally {
      httpServer.close();
    }
  });
});
