import type { Application } from "express";
import type { Server } from "http";
import { afterEach, beforeEach } from "@jest/globals";
import got, { Got } from "got";

interface Context {
  readonly server: Server;
  readonly client: Got;
}

/**
 * Set up hooks to start the application server on a random port before each
 * test and tear it down after the test. This function returns a `Context`
 * object with information about the server and a pre-configured instance of
 * `got` that will connect to that server.
 * @param app The application object to start a server for.
 *
 * @example
 * import { useServerForTests } from "./support/server-testing"
 *
 * describe("A test suite", () => {
 *   const context = useServerForTests(app);
 *
 *   it("should do something", async () => {
 *     const response = await context.client.get("health");
 *     expect(response).toHaveProperty("statusCode", 200);
 *   });
 * });
 */
export function useServerForTests(app: Application): Context {
  let server: Server | undefined;
  let client: Got | undefined;

  beforeEach((done) => {
    const listener = app.listen(0, () => {
      const address = listener.address();
      if (!address || typeof address === "string") {
        done(new Error(`Unexpected server address: ${address}`));
        return;
      }

      client = got.extend({
        prefixUrl: `http://127.0.0.1:${address.port}`,
        responseType: "json",
        throwHttpErrors: false,
        retry: 0,
      });
      done();
    });
    server = listener;
  });

  afterEach((done) => {
    if (server) {
      server.close((error?: Error) => {
        server = undefined;
        client = undefined;
        // Jest needs a tick after server shutdown to detect
        // that the resources have been released.
        setTimeout(() => done(error), 10);
      });
    } else {
      done();
    }
  });

  return {
    get server() {
      if (!server) throw new Error("The test server is not running");
      return server;
    },
    get client() {
      if (!client) throw new Error("The test server is not running");
      return client;
    },
  };
}
