import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { UploadSessionManager } from "../../src/domain/uploadSessionManager.js";
import { createGatewayMcpServer } from "../../src/server/createServer.js";
import { assetFixture, emptyResponse, FakeImmich, TEST_BASE_URL } from "../helpers/fakeImmich.js";

describe("MCP in-memory integration", () => {
  let fake: FakeImmich;
  let sessions: UploadSessionManager;
  let server: McpServer;
  let client: Client;

  beforeEach(async () => {
    fake = new FakeImmich();
    sessions = new UploadSessionManager({ timeoutMs: 60_000, generateId: () => "session-1" });
    server = createGatewayMcpServer({
      client: fake.client({ maxAttempts: 1 }),
      sessions,
      maxPageSize: 2,
      publicBaseUrl: "http://gateway.test:5000/",
      version: "test"
    });

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    client = new Client({ name: "test-client", version: "1.0.0" });

    await server.connect(serverTransport);
    await client.connect(clientTransport);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
  });

  it("exposes the gateway tool surface", async () => {
    const { tools } = await client.listTools();
    const names = tools.map((tool) => tool.name);

    for (const name of [
      "immich.ping",
      "immich.capabilities",
      "immich.assets.list",
      "immich.assets.bulk_update",
      "immich.assets.delete",
      "immich.assets.upload_init",
      "immich.assets.upload_status",
      "immich.search.metadata",
      "immich.albums.delete",
      "immich.people.merge",
      "immich.tags.delete",
      "immich.shared_links.delete",
      "immich.activities.delete"
    ]) {
      expect(names).toContain(name);
    }

    const deleteTool = tools.find((tool) => tool.name === "immich.albums.delete");
    expect(deleteTool?.annotations?.destructiveHint).toBe(true);
  });

  it("wraps upstream answers in the envelope", async () => {
    fake.onJson("GET", "/api/server/about", { version: "v1.118.2", build: "abc" });

    const result = await client.callTool({ name: "immich.ping", arguments: {} });

    expect(result.isError).toBeFalsy();
    expect(result.structuredContent).toMatchObject({
      ok: true,
      result: { connected: true, version: "v1.118.2", build: "abc", nodejs: null },
      meta: { upstream_base_url: TEST_BASE_URL }
    });
  });

  it("previews a bulk update without mutating anything", async () => {
    const result = await client.callTool({
      name: "immich.assets.bulk_update",
      arguments: { ids: "1,2,3", is_favorite: true }
    });

    expect(result.isError).toBeFalsy();
    expect(result.structuredContent).toMatchObject({
      ok: true,
      result: {
        executed: false,
        affected_ids: ["1", "2", "3"],
        warnings: ["This is a dry run. Set dry_run=false and confirm=true to execute."],
        changes: { isFavorite: true }
      }
    });
    expect(fake.mutatingCalls()).toHaveLength(0);
  });

  it("applies a bulk update once both flags are set", async () => {
    fake.on("PUT", "/api/assets", () => emptyResponse());

    const result = await client.callTool({
      name: "immich.assets.bulk_update",
      arguments: { ids: "1, 2", is_archived: true, dry_run: false, confirm: true }
    });

    expect(result.structuredContent).toMatchObject({
      ok: true,
      result: { executed: true, updated_count: 2, asset_ids: ["1", "2"], changes: { isArchived: true } }
    });
    expect(fake.callsTo("PUT", "/api/assets").map((call) => call.json)).toEqual([{ ids: ["1", "2"], isArchived: true }]);
  });

  it("rejects a bulk update with no changes", async () => {
    const result = await client.callTool({ name: "immich.assets.bulk_update", arguments: { ids: "1" } });

    expect(result.isError).toBe(true);
    expect(result.structuredContent).toMatchObject({
      ok: false,
      error: { code: "VALIDATION", message: "No changes provided" }
    });
  });

  it("asks for confirmation before deleting assets and previews the ones that exist", async () => {
    fake.onJson("GET", "/api/assets/a1", assetFixture("a1"));

    const result = await client.callTool({ name: "immich.assets.delete", arguments: { ids: "a1,missing" } });

    expect(result.isError).toBeFalsy();
    expect(result.structuredContent).toMatchObject({
      ok: false,
      error: {
        code: "CONFIRMATION_REQUIRED",
        message: "This is a dry run. Set dry_run=false and confirm=true to execute.",
        details: {
          affected_ids: ["a1", "missing"],
          warning: "This is a dry run. Set dry_run=false and confirm=true to execute.",
          asset_count: 2,
          force: false,
          preview: [{ id: "a1", original_file_name: "a1.jpg", type: "IMAGE", created: "2024-05-01T10:00:00.000Z" }]
        }
      }
    });
    expect(fake.mutatingCalls()).toHaveLength(0);
  });

  it("deletes assets once dry_run is off and confirm is set", async () => {
    fake.on("DELETE", "/api/assets", () => emptyResponse());

    const result = await client.callTool({
      name: "immich.assets.delete",
      arguments: { ids: "a1,a2", force: true, dry_run: false, confirm: true }
    });

    expect(result.structuredContent).toMatchObject({
      ok: true,
      result: { executed: true, deleted: true, asset_count: 2, asset_ids: ["a1", "a2"], force: true }
    });
    expect(fake.callsTo("DELETE", "/api/assets")[0]?.json).toEqual({ ids: ["a1", "a2"], force: true });
  });

  it("answers a missing id with a VALIDATION envelope", async () => {
    const result = await client.callTool({ name: "immich.albums.delete", arguments: {} });

    expect(result.isError).toBe(true);
    expect(result.structuredContent).toMatchObject({
      ok: false,
      error: { code: "VALIDATION", message: "id is required", details: { field: "id" } },
      meta: { upstream_base_url: TEST_BASE_URL }
    });
    expect(fake.calls).toHaveLength(0);
  });

  it("answers a blank album name with a VALIDATION envelope", async () => {
    const result = await client.callTool({ name: "immich.albums.create", arguments: { album_name: "   " } });

    expect(result.isError).toBe(true);
    expect(result.structuredContent).toMatchObject({
      ok: false,
      error: { code: "VALIDATION", message: "album_name is required" }
    });
    expect(fake.calls).toHaveLength(0);
  });

  it("answers an out-of-range rating with a VALIDATION envelope", async () => {
    const result = await client.callTool({ name: "immich.assets.update", arguments: { id: "a1", rating: 7 } });

    expect(result.structuredContent).toMatchObject({
      ok: false,
      error: { code: "VALIDATION", message: "rating must be between 0 and 5" }
    });
    expect(fake.calls).toHaveLength(0);
  });

  it("requires confirmation before deleting an album", async () => {
    fake.onJson("GET", "/api/albums/al-1", { id: "al-1", albumName: "Summer", assetCount: 12, shared: false });
    fake.on("DELETE", "/api/albums/al-1", () => emptyResponse());

    const refused = await client.callTool({ name: "immich.albums.delete", arguments: { id: "al-1" } });

    expect(refused.isError).toBeFalsy();
    expect(refused.structuredContent).toMatchObject({
      ok: false,
      error: {
        code: "CONFIRMATION_REQUIRED",
        details: { preview: { album_id: "al-1", album_name: "Summer", asset_count: 12, shared: false } }
      }
    });
    expect(fake.callsTo("DELETE", "/api/albums/al-1")).toHaveLength(0);

    const confirmed = await client.callTool({ name: "immich.albums.delete", arguments: { id: "al-1", confirm: true } });

    expect(confirmed.structuredContent).toMatchObject({ ok: true, result: { deleted: true, album_id: "al-1" } });
    expect(fake.callsTo("DELETE", "/api/albums/al-1")).toHaveLength(1);
  });

  it("reports a missing album as NOT_FOUND when previewing a delete", async () => {
    const result = await client.callTool({ name: "immich.albums.delete", arguments: { id: "gone" } });

    expect(result.isError).toBe(true);
    expect(result.structuredContent).toMatchObject({ ok: false, error: { code: "NOT_FOUND" } });
  });

  it("refuses to merge a person into itself", async () => {
    const result = await client.callTool({
      name: "immich.people.merge",
      arguments: { id: "p1", source_ids: "p2,p1", confirm: true }
    });

    expect(result.isError).toBe(true);
    expect(result.structuredContent).toMatchObject({
      ok: false,
      error: { code: "VALIDATION", message: "A person cannot be merged into itself" }
    });
    expect(fake.calls).toHaveLength(0);
  });

  it("pages asset listings and clamps to the maximum page size", async () => {
    fake.onJson("GET", "/api/assets", [assetFixture("a1"), assetFixture("a2"), assetFixture("a3")]);

    const first = await client.callTool({ name: "immich.assets.list", arguments: { size: 50 } });
    const second = await client.callTool({ name: "immich.assets.list", arguments: { page: 2, size: 2 } });

    expect(first.structuredContent).toMatchObject({
      ok: true,
      result: [{ id: "a1" }, { id: "a2" }],
      meta: { page: 1, page_size: 2, total: 3, next: "page=2&size=2" }
    });
    expect(second.structuredContent).toMatchObject({
      result: [{ id: "a3" }],
      meta: { page: 2, page_size: 2, total: 3, next: null }
    });
  });

  it("truncates fractional page numbers instead of rejecting them", async () => {
    fake.onJson("GET", "/api/assets", [assetFixture("a1"), assetFixture("a2"), assetFixture("a3")]);

    const result = await client.callTool({ name: "immich.assets.list", arguments: { page: 2.7, size: 1.9 } });

    expect(result.structuredContent).toMatchObject({
      ok: true,
      result: [{ id: "a2" }],
      meta: { page: 2, page_size: 1, total: 3, next: "page=3&size=1" }
    });
  });

  it("opens upload sessions and reports their status", async () => {
    const init = await client.callTool({
      name: "immich.assets.upload_init",
      arguments: { file_name: "beach.jpg", is_favorite: true }
    });

    const sessionId = "session-1";
    expect(sessions.getSession(sessionId)?.suggestedFileName).toBe("beach.jpg");
    expect(sessions.getSession(sessionId)?.favorite).toBe(true);

    expect(init.structuredContent).toMatchObject({
      ok: true,
      result: {
        session_id: sessionId,
        upload_url: `http://gateway.test:5000/upload/${sessionId}`,
        instructions: { method: "POST", form_field: "file" }
      }
    });

    const status = await client.callTool({ name: "immich.assets.upload_status", arguments: { session_id: sessionId } });
    expect(status.structuredContent).toMatchObject({
      ok: true,
      result: { session_id: sessionId, status: "pending", asset_id: null, suggested_file_name: "beach.jpg" }
    });

    const unknown = await client.callTool({ name: "immich.assets.upload_status", arguments: { session_id: "nope" } });
    expect(unknown.structuredContent).toMatchObject({
      ok: false,
      error: { code: "NOT_FOUND", message: "Upload session nope not found" }
    });
  });
});
