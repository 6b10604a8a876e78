import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { UploadSessionManager } from "../../src/domain/uploadSessionManager.js";
import { createGatewayMcpServer } from "../../src/server/createServer.js";
import { assetFixture, emptyResponse, FakeImmich, jsonResponse, TEST_BASE_URL } from "../helpers/fakeImmich.js";

describe("tool groups over MCP", () => {
  let fake: FakeImmich;
  let server: McpServer;
  let client: Client;

  beforeEach(async () => {
    fake = new FakeImmich();
    server = createGatewayMcpServer({
      client: fake.client({ maxAttempts: 1 }),
      sessions: new UploadSessionManager(),
      maxPageSize: 100,
      publicBaseUrl: "http://gateway.test",
      version: "test"
    });

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    client = new Client({ name: "tools-test-client", version: "1.0.0" });
    await server.connect(serverTransport);
    await client.connect(clientTransport);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
  });

  describe("search", () => {
    it("sends normalized criteria and derives the next cursor from the upstream page", async () => {
      fake.onJson("POST", "/api/search/metadata", {
        assets: { items: [assetFixture("a1")], total: 40, nextPage: "2" }
      });

      const result = await client.callTool({
        name: "immich.search.metadata",
        arguments: { type: "ALL", taken_after: "2024-01-01", person_ids: "p1, p2", size: 10, city: "Oslo" }
      });

      expect(fake.callsTo("POST", "/api/search/metadata")[0]?.json).toEqual({
        page: 1,
        size: 10,
        takenAfter: "2024-01-01T00:00:00.000Z",
        city: "Oslo",
        personIds: ["p1", "p2"]
      });
      expect(result.structuredContent).toMatchObject({
        ok: true,
        result: [{ id: "a1", original_file_name: "a1.jpg" }],
        meta: { page: 1, page_size: 10, total: 40, next: "page=2&size=10" }
      });
    });

    it("rejects malformed dates before calling upstream", async () => {
      const result = await client.callTool({
        name: "immich.search.metadata",
        arguments: { taken_before: "yesterday" }
      });

      expect(result.isError).toBe(true);
      expect(result.structuredContent).toMatchObject({
        ok: false,
        error: { code: "VALIDATION", message: "taken_before must be an ISO-8601 date" }
      });
      expect(fake.calls).toHaveLength(0);
    });
  });

  describe("tags", () => {
    it("previews and then deletes a tag", async () => {
      fake.onJson("GET", "/api/tags/t1", { id: "t1", name: "trips", value: "travel/trips" });
      fake.on("DELETE", "/api/tags/t1", () => emptyResponse());

      const refused = await client.callTool({ name: "immich.tags.delete", arguments: { id: "t1" } });
      expect(refused.structuredContent).toMatchObject({
        ok: false,
        error: {
          code: "CONFIRMATION_REQUIRED",
          details: { preview: { tag_id: "t1", name: "trips", value: "travel/trips" } }
        }
      });
      expect(fake.mutatingCalls()).toHaveLength(0);

      const deleted = await client.callTool({ name: "immich.tags.delete", arguments: { id: "t1", confirm: true } });
      expect(deleted.structuredContent).toMatchObject({ ok: true, result: { deleted: true, tag_id: "t1" } });
      expect(fake.callsTo("DELETE", "/api/tags/t1")).toHaveLength(1);
    });
  });

  describe("shared links", () => {
    it("requires an album id for album links", async () => {
      const result = await client.callTool({ name: "immich.shared_links.create", arguments: { type: "ALBUM" } });

      expect(result.structuredContent).toMatchObject({
        ok: false,
        error: { code: "VALIDATION", message: "album_id is required for ALBUM links" }
      });
    });

    it("creates individual links from a comma-separated id list", async () => {
      fake.onJson("POST", "/api/shared-links", { id: "sl1", key: "key-1", type: "INDIVIDUAL" }, 201);

      const result = await client.callTool({
        name: "immich.shared_links.create",
        arguments: { asset_ids: "a1, a2,,a3", allow_download: false }
      });

      expect(fake.callsTo("POST", "/api/shared-links")[0]?.json).toEqual({
        type: "INDIVIDUAL",
        assetIds: ["a1", "a2", "a3"],
        allowDownload: false
      });
      expect(result.structuredContent).toMatchObject({
        ok: true,
        result: { id: "sl1", type: "INDIVIDUAL", share_url: `${TEST_BASE_URL}/share/key-1` }
      });
    });
  });

  describe("activities", () => {
    it("requires comment text for comments", async () => {
      const result = await client.callTool({
        name: "immich.activities.create",
        arguments: { album_id: "al-1", comment: "   " }
      });

      expect(result.structuredContent).toMatchObject({
        ok: false,
        error: { code: "VALIDATION", message: "Comment text is required for comment type" }
      });
    });

    it("creates likes without a comment", async () => {
      fake.onJson("POST", "/api/activities", { id: "act-1", type: "like" }, 201);

      const result = await client.callTool({
        name: "immich.activities.create",
        arguments: { album_id: "al-1", type: "like", comment: "ignored" }
      });

      expect(fake.callsTo("POST", "/api/activities")[0]?.json).toEqual({ albumId: "al-1", type: "like" });
      expect(result.structuredContent).toMatchObject({
        ok: true,
        result: { id: "act-1", type: "like", comment: null, album_id: "al-1" }
      });
    });

    it("uses the id itself as the delete preview", async () => {
      const result = await client.callTool({ name: "immich.activities.delete", arguments: { id: "act-9" } });

      expect(result.structuredContent).toMatchObject({
        ok: false,
        error: { code: "CONFIRMATION_REQUIRED", details: { preview: { activity_id: "act-9" } } }
      });
      expect(fake.calls).toHaveLength(0);
    });
  });

  describe("people", () => {
    it("previews a merge with the target and the sources that exist", async () => {
      fake.onJson("GET", "/api/people/p1", { id: "p1", name: "Ada" });
      fake.onJson("GET", "/api/people/p2", { id: "p2", name: "Ada L." });

      const result = await client.callTool({
        name: "immich.people.merge",
        arguments: { id: "p1", source_ids: "p2,p3" }
      });

      expect(result.isError).toBeFalsy();
      expect(result.structuredContent).toMatchObject({
        ok: false,
        error: {
          code: "CONFIRMATION_REQUIRED",
          details: {
            preview: { target: { id: "p1", name: "Ada" }, sources: [{ id: "p2", name: "Ada L." }], source_count: 2 }
          }
        }
      });
      expect(fake.mutatingCalls()).toHaveLength(0);
    });

    it("reports per-source results once confirmed", async () => {
      fake.on("POST", "/api/people/p1/merge", () =>
        jsonResponse([
          { id: "p2", success: true },
          { id: "p3", success: false, error: "not_found" }
        ])
      );

      const result = await client.callTool({
        name: "immich.people.merge",
        arguments: { id: "p1", source_ids: "p2,p3", confirm: true }
      });

      expect(fake.callsTo("POST", "/api/people/p1/merge")[0]?.json).toEqual({ ids: ["p2", "p3"] });
      expect(result.structuredContent).toMatchObject({
        ok: true,
        result: {
          target_id: "p1",
          merged_count: 2,
          requested: 2,
          succeeded: 1,
          failed: [{ id: "p3", error: "not_found" }]
        }
      });
    });
  });

  describe("health", () => {
    it("reports capabilities with a warning when features are unavailable", async () => {
      fake.onJson("GET", "/api/server/about", { version: "v1.118.2" });

      const result = await client.callTool({ name: "immich.capabilities", arguments: {} });

      expect(result.structuredContent).toMatchObject({
        ok: true,
        result: { connected: true, version: "v1.118.2", features: null, max_page_size: 100 },
        meta: { warnings: ["Feature list unavailable: HTTP 404"] }
      });
    });

    it("surfaces upstream faults as UPSTREAM_ERROR", async () => {
      fake.onJson("GET", "/api/albums/al-1", { message: "boom" }, 500);

      const result = await client.callTool({ name: "immich.albums.get", arguments: { id: "al-1" } });

      expect(result.isError).toBe(true);
      expect(result.structuredContent).toMatchObject({
        ok: false,
        error: { code: "UPSTREAM_ERROR", message: "Album al-1: HTTP 500", details: { status: 500 } }
      });
    });
  });
});
