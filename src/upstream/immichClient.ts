import type { z } from "zod";
import { log } from "../utils/logger.js";
import { AbortedError, DEFAULT_RETRY_POLICY, backoffDelay, isTransientStatus, waitFor, type RetryPolicy } from "./retry.js";
import {
  activityListSchema,
  activitySchema,
  activityStatisticsSchema,
  albumListSchema,
  albumSchema,
  albumStatisticsSchema,
  assetListSchema,
  assetSchema,
  assetStatisticsSchema,
  bulkIdResponseListSchema,
  exploreDataSchema,
  peopleResponseSchema,
  personSchema,
  searchAssetPageSchema,
  serverAboutSchema,
  serverFeaturesSchema,
  sharedLinkListSchema,
  sharedLinkSchema,
  tagListSchema,
  tagSchema,
  type Activity,
  type ActivityStatistics,
  type Album,
  type AlbumStatistics,
  type Asset,
  type AssetStatistics,
  type BulkIdResponse,
  type ExploreData,
  type PeopleResponse,
  type Person,
  type SearchAssetPage,
  type ServerAbout,
  type ServerFeatures,
  type SharedLink,
  type Tag
} from "./schemas.js";

const logger = log.child("immich");

export type UpstreamResult<T> =
  | { ok: true; value: T }
  | { ok: false; status?: number; message: string; body?: string };

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

type QueryValue = string | number | boolean | null | undefined;

interface RequestBody {
  body: string | FormData;
  contentType?: string;
}

interface RequestOptions {
  query?: Record<string, QueryValue>;
  json?: unknown;
  /** Rebuilt on every attempt so a retry starts from fresh input. */
  buildBody?: () => Promise<RequestBody>;
  signal?: AbortSignal;
}

export interface ImmichClientOptions {
  baseUrl: string;
  apiKey: string;
  fetch?: typeof fetch;
  retry?: Partial<RetryPolicy>;
  timeoutMs?: number;
  now?: () => Date;
}

export interface AssetUploadInput {
  fileName: string;
  read: () => Promise<Buffer>;
  deviceModifiedAt?: Date;
  isFavorite?: boolean;
  isArchived?: boolean;
}

export interface AssetDownloadInfo {
  id: string;
  originalUrl: string;
  thumbnailUrl: string;
  previewUrl: string;
}

export interface AssetListFilters {
  size?: number;
  isFavorite?: boolean;
  isArchived?: boolean;
  isTrashed?: boolean;
  updatedAfter?: string;
  updatedBefore?: string;
}

export interface ActivityQuery {
  albumId: string;
  assetId?: string;
  type?: string;
  level?: string;
}

export function ok<T>(value: T): UpstreamResult<T> {
  return { ok: true, value };
}

export function mapResult<T, U>(result: UpstreamResult<T>, map: (value: T) => U): UpstreamResult<U> {
  return result.ok ? { ok: true, value: map(result.value) } : result;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function toQueryString(query: Record<string, QueryValue> | undefined): string {
  if (!query) {
    return "";
  }

  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined || value === null || value === "") {
      continue;
    }
    params.append(key, String(value));
  }

  const serialized = params.toString();
  return serialized ? `?${serialized}` : "";
}

function truncate(text: string, max = 500): string {
  return text.length <= max ? text : `${text.slice(0, max)}...(${text.length} chars)`;
}

export function deviceAssetIdFor(fileName: string, byteLength: number, at: Date): string {
  return `${fileName}-${byteLength}-${at.getTime()}`;
}

/**
 * Client for the upstream photo library REST API.
 *
 * Every method resolves to an `UpstreamResult`; transport faults, HTTP errors and
 * malformed payloads are reported as `{ ok: false }` and logged here.
 */
export class ImmichClient {
  private readonly base: string;
  private readonly apiKey: string;
  private readonly fetchImpl: typeof fetch;
  private readonly policy: RetryPolicy;
  private readonly timeoutMs: number;
  private readonly now: () => Date;

  constructor(options: ImmichClientOptions) {
    this.base = options.baseUrl.replace(/\/+$/, "");
    this.apiKey = options.apiKey;
    this.fetchImpl = options.fetch ?? globalThis.fetch;
    this.policy = { ...DEFAULT_RETRY_POLICY, ...options.retry };
    this.timeoutMs = options.timeoutMs ?? 120_000;
    this.now = options.now ?? (() => new Date());
  }

  get baseUrl(): string {
    return this.base;
  }

  // Health

  ping(signal?: AbortSignal): Promise<UpstreamResult<ServerAbout>> {
    return this.request("GET", "/api/server/about", serverAboutSchema, { signal });
  }

  getFeatures(signal?: AbortSignal): Promise<UpstreamResult<ServerFeatures>> {
    return this.request("GET", "/api/server/features", serverFeaturesSchema, { signal });
  }

  // Assets

  listAssets(filters: AssetListFilters = {}, signal?: AbortSignal): Promise<UpstreamResult<Asset[]>> {
    return this.request("GET", "/api/assets", assetListSchema, { query: { ...filters }, signal });
  }

  getAsset(id: string, signal?: AbortSignal): Promise<UpstreamResult<Asset>> {
    return this.request("GET", `/api/assets/${encodeURIComponent(id)}`, assetSchema, { signal });
  }

  updateAsset(id: string, changes: Record<string, unknown>, signal?: AbortSignal): Promise<UpstreamResult<Asset>> {
    return this.request("PUT", `/api/assets/${encodeURIComponent(id)}`, assetSchema, { json: changes, signal });
  }

  bulkUpdateAssets(
    ids: string[],
    changes: Record<string, unknown>,
    signal?: AbortSignal
  ): Promise<UpstreamResult<void>> {
    return this.requestVoid("PUT", "/api/assets", { json: { ids, ...changes }, signal });
  }

  deleteAssets(ids: string[], force: boolean, signal?: AbortSignal): Promise<UpstreamResult<void>> {
    return this.requestVoid("DELETE", "/api/assets", { json: { ids, force }, signal });
  }

  getAssetStatistics(signal?: AbortSignal): Promise<UpstreamResult<AssetStatistics>> {
    return this.request("GET", "/api/assets/statistics", assetStatisticsSchema, { signal });
  }

  /**
   * Uploads one file. Each attempt re-reads the bytes and derives a fresh
   * device asset id from the file name, byte length and the attempt's timestamp.
   */
  uploadAsset(input: AssetUploadInput, signal?: AbortSignal): Promise<UpstreamResult<Asset>> {
    return this.request("POST", "/api/assets", assetSchema, {
      signal,
      buildBody: async () => {
        const bytes = await input.read();
        const at = this.now();
        const form = new FormData();
        form.append("assetData", new Blob([bytes]), input.fileName);
        form.append("deviceAssetId", deviceAssetIdFor(input.fileName, bytes.length, at));
        form.append("deviceModifiedAt", (input.deviceModifiedAt ?? at).toISOString());
        form.append("fileCreatedAt", at.toISOString());
        form.append("fileModifiedAt", at.toISOString());
        if (input.isFavorite !== undefined) form.append("isFavorite", String(input.isFavorite));
        if (input.isArchived !== undefined) form.append("isArchived", String(input.isArchived));
        return { body: form };
      }
    });
  }

  assetDownloadInfo(id: string): AssetDownloadInfo {
    const path = `${this.base}/api/assets/${encodeURIComponent(id)}`;
    return {
      id,
      originalUrl: `${path}/original`,
      thumbnailUrl: `${path}/thumbnail`,
      previewUrl: `${path}/thumbnail?size=preview`
    };
  }

  // Search

  searchMetadata(criteria: Record<string, unknown>, signal?: AbortSignal): Promise<UpstreamResult<SearchAssetPage>> {
    return this.request("POST", "/api/search/metadata", searchAssetPageSchema, { json: criteria, signal });
  }

  searchSmart(criteria: Record<string, unknown>, signal?: AbortSignal): Promise<UpstreamResult<SearchAssetPage>> {
    return this.request("POST", "/api/search/smart", searchAssetPageSchema, { json: criteria, signal });
  }

  searchExplore(signal?: AbortSignal): Promise<UpstreamResult<ExploreData>> {
    return this.request("GET", "/api/search/explore", exploreDataSchema, { signal });
  }

  // Albums

  listAlbums(filters: { shared?: boolean; assetId?: string } = {}, signal?: AbortSignal): Promise<UpstreamResult<Album[]>> {
    return this.request("GET", "/api/albums", albumListSchema, { query: { ...filters }, signal });
  }

  getAlbum(id: string, withoutAssets?: boolean, signal?: AbortSignal): Promise<UpstreamResult<Album>> {
    return this.request("GET", `/api/albums/${encodeURIComponent(id)}`, albumSchema, {
      query: { withoutAssets },
      signal
    });
  }

  createAlbum(input: Record<string, unknown>, signal?: AbortSignal): Promise<UpstreamResult<Album>> {
    return this.request("POST", "/api/albums", albumSchema, { json: input, signal });
  }

  updateAlbum(id: string, changes: Record<string, unknown>, signal?: AbortSignal): Promise<UpstreamResult<Album>> {
    return this.request("PATCH", `/api/albums/${encodeURIComponent(id)}`, albumSchema, { json: changes, signal });
  }

  deleteAlbum(id: string, signal?: AbortSignal): Promise<UpstreamResult<void>> {
    return this.requestVoid("DELETE", `/api/albums/${encodeURIComponent(id)}`, { signal });
  }

  addAssetsToAlbum(id: string, assetIds: string[], signal?: AbortSignal): Promise<UpstreamResult<BulkIdResponse[]>> {
    return this.request("PUT", `/api/albums/${encodeURIComponent(id)}/assets`, bulkIdResponseListSchema, {
      json: { ids: assetIds },
      signal
    });
  }

  removeAssetsFromAlbum(id: string, assetIds: string[], signal?: AbortSignal): Promise<UpstreamResult<BulkIdResponse[]>> {
    return this.request("DELETE", `/api/albums/${encodeURIComponent(id)}/assets`, bulkIdResponseListSchema, {
      json: { ids: assetIds },
      signal
    });
  }

  getAlbumStatistics(signal?: AbortSignal): Promise<UpstreamResult<AlbumStatistics>> {
    return this.request("GET", "/api/albums/statistics", albumStatisticsSchema, { signal });
  }

  // People

  listPeople(withHidden?: boolean, signal?: AbortSignal): Promise<UpstreamResult<PeopleResponse>> {
    return this.request("GET", "/api/people", peopleResponseSchema, { query: { withHidden }, signal });
  }

  getPerson(id: string, signal?: AbortSignal): Promise<UpstreamResult<Person>> {
    return this.request("GET", `/api/people/${encodeURIComponent(id)}`, personSchema, { signal });
  }

  updatePerson(id: string, changes: Record<string, unknown>, signal?: AbortSignal): Promise<UpstreamResult<Person>> {
    return this.request("PUT", `/api/people/${encodeURIComponent(id)}`, personSchema, { json: changes, signal });
  }

  mergePeople(targetId: string, sourceIds: string[], signal?: AbortSignal): Promise<UpstreamResult<BulkIdResponse[]>> {
    return this.request("POST", `/api/people/${encodeURIComponent(targetId)}/merge`, bulkIdResponseListSchema, {
      json: { ids: sourceIds },
      signal
    });
  }

  getPersonAssets(id: string, signal?: AbortSignal): Promise<UpstreamResult<Asset[]>> {
    return this.request("GET", `/api/people/${encodeURIComponent(id)}/assets`, assetListSchema, { signal });
  }

  // Tags

  listTags(signal?: AbortSignal): Promise<UpstreamResult<Tag[]>> {
    return this.request("GET", "/api/tags", tagListSchema, { signal });
  }

  getTag(id: string, signal?: AbortSignal): Promise<UpstreamResult<Tag>> {
    return this.request("GET", `/api/tags/${encodeURIComponent(id)}`, tagSchema, { signal });
  }

  createTag(input: Record<string, unknown>, signal?: AbortSignal): Promise<UpstreamResult<Tag>> {
    return this.request("POST", "/api/tags", tagSchema, { json: input, signal });
  }

  updateTag(id: string, changes: Record<string, unknown>, signal?: AbortSignal): Promise<UpstreamResult<Tag>> {
    return this.request("PUT", `/api/tags/${encodeURIComponent(id)}`, tagSchema, { json: changes, signal });
  }

  deleteTag(id: string, signal?: AbortSignal): Promise<UpstreamResult<void>> {
    return this.requestVoid("DELETE", `/api/tags/${encodeURIComponent(id)}`, { signal });
  }

  tagAssets(id: string, assetIds: string[], signal?: AbortSignal): Promise<UpstreamResult<BulkIdResponse[]>> {
    return this.request("PUT", `/api/tags/${encodeURIComponent(id)}/assets`, bulkIdResponseListSchema, {
      json: { ids: assetIds },
      signal
    });
  }

  untagAssets(id: string, assetIds: string[], signal?: AbortSignal): Promise<UpstreamResult<BulkIdResponse[]>> {
    return this.request("DELETE", `/api/tags/${encodeURIComponent(id)}/assets`, bulkIdResponseListSchema, {
      json: { ids: assetIds },
      signal
    });
  }

  // Shared links

  listSharedLinks(signal?: AbortSignal): Promise<UpstreamResult<SharedLink[]>> {
    return this.request("GET", "/api/shared-links", sharedLinkListSchema, { signal });
  }

  getSharedLink(id: string, signal?: AbortSignal): Promise<UpstreamResult<SharedLink>> {
    return this.request("GET", `/api/shared-links/${encodeURIComponent(id)}`, sharedLinkSchema, { signal });
  }

  createSharedLink(input: Record<string, unknown>, signal?: AbortSignal): Promise<UpstreamResult<SharedLink>> {
    return this.request("POST", "/api/shared-links", sharedLinkSchema, { json: input, signal });
  }

  updateSharedLink(id: string, changes: Record<string, unknown>, signal?: AbortSignal): Promise<UpstreamResult<SharedLink>> {
    return this.request("PATCH", `/api/shared-links/${encodeURIComponent(id)}`, sharedLinkSchema, {
      json: changes,
      signal
    });
  }

  deleteSharedLink(id: string, signal?: AbortSignal): Promise<UpstreamResult<void>> {
    return this.requestVoid("DELETE", `/api/shared-links/${encodeURIComponent(id)}`, { signal });
  }

  addAssetsToSharedLink(id: string, assetIds: string[], signal?: AbortSignal): Promise<UpstreamResult<BulkIdResponse[]>> {
    return this.request("PUT", `/api/shared-links/${encodeURIComponent(id)}/assets`, bulkIdResponseListSchema, {
      json: { assetIds },
      signal
    });
  }

  removeAssetsFromSharedLink(
    id: string,
    assetIds: string[],
    signal?: AbortSignal
  ): Promise<UpstreamResult<BulkIdResponse[]>> {
    return this.request("DELETE", `/api/shared-links/${encodeURIComponent(id)}/assets`, bulkIdResponseListSchema, {
      json: { assetIds },
      signal
    });
  }

  // Activities

  listActivities(query: ActivityQuery, signal?: AbortSignal): Promise<UpstreamResult<Activity[]>> {
    return this.request("GET", "/api/activities", activityListSchema, { query: { ...query }, signal });
  }

  createActivity(input: Record<string, unknown>, signal?: AbortSignal): Promise<UpstreamResult<Activity>> {
    return this.request("POST", "/api/activities", activitySchema, { json: input, signal });
  }

  deleteActivity(id: string, signal?: AbortSignal): Promise<UpstreamResult<void>> {
    return this.requestVoid("DELETE", `/api/activities/${encodeURIComponent(id)}`, { signal });
  }

  getActivityStatistics(albumId: string, assetId?: string, signal?: AbortSignal): Promise<UpstreamResult<ActivityStatistics>> {
    return this.request("GET", "/api/activities/statistics", activityStatisticsSchema, {
      query: { albumId, assetId },
      signal
    });
  }

  // Transport

  private request<S extends z.ZodTypeAny>(
    method: HttpMethod,
    path: string,
    schema: S,
    options: RequestOptions
  ): Promise<UpstreamResult<z.output<S>>> {
    return this.send(method, path, options, (text) => {
      let payload: unknown;
      try {
        payload = text ? JSON.parse(text) : undefined;
      } catch (error) {
        return { ok: false, message: `Malformed JSON from upstream: ${errorMessage(error)}`, body: truncate(text) };
      }

      const parsed = schema.safeParse(payload);
      if (!parsed.success) {
        return {
          ok: false,
          message: `Unexpected upstream payload: ${parsed.error.issues.map((issue) => `${issue.path.join(".")} ${issue.message}`).join("; ")}`,
          body: truncate(text)
        };
      }

      return ok(parsed.data);
    });
  }

  private requestVoid(method: HttpMethod, path: string, options: RequestOptions): Promise<UpstreamResult<void>> {
    return this.send(method, path, options, () => ok(undefined));
  }

  private async buildBody(options: RequestOptions): Promise<RequestBody | undefined> {
    if (options.buildBody) {
      return options.buildBody();
    }
    if (options.json !== undefined) {
      return { body: JSON.stringify(options.json), contentType: "application/json" };
    }
    return undefined;
  }

  private async send<T>(
    method: HttpMethod,
    path: string,
    options: RequestOptions,
    parse: (text: string) => UpstreamResult<T>
  ): Promise<UpstreamResult<T>> {
    const url = `${this.base}${path}${toQueryString(options.query)}`;
    const signal = options.signal;
    let lastFailure: UpstreamResult<T> = { ok: false, message: "Request was not attempted" };

    for (let attempt = 1; attempt <= this.policy.maxAttempts; attempt += 1) {
      if (signal?.aborted) {
        return { ok: false, message: "Request aborted" };
      }

      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), this.timeoutMs);
      const relayAbort = () => controller.abort();
      signal?.addEventListener("abort", relayAbort, { once: true });

      let retryable = false;
      try {
        const payload = await this.buildBody(options);
        const headers: Record<string, string> = {
          accept: "application/json",
          "x-api-key": this.apiKey
        };
        if (payload?.contentType) {
          headers["content-type"] = payload.contentType;
        }

        const response = await this.fetchImpl(url, {
          method,
          headers,
          body: payload?.body,
          signal: controller.signal
        });
        const text = await response.text();

        if (response.ok) {
          const result = parse(text);
          if (!result.ok) {
            logger.error("upstream payload rejected", { method, path, message: result.message });
          }
          return result;
        }

        lastFailure = {
          ok: false,
          status: response.status,
          message: `HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ""}`,
          body: truncate(text)
        };
        retryable = isTransientStatus(response.status);
        logger.warn("upstream request failed", { method, path, attempt, status: response.status, body: truncate(text, 200) });
      } catch (error) {
        if (signal?.aborted) {
          return { ok: false, message: "Request aborted" };
        }
        const timedOut = controller.signal.aborted;
        lastFailure = {
          ok: false,
          message: timedOut ? `Request timed out after ${this.timeoutMs}ms` : `Network error: ${errorMessage(error)}`
        };
        retryable = true;
        logger.warn("upstream request errored", { method, path, attempt, error: errorMessage(error) });
      } finally {
        clearTimeout(timer);
        signal?.removeEventListener("abort", relayAbort);
      }

      if (!retryable || attempt === this.policy.maxAttempts) {
        break;
      }

      try {
        await waitFor(backoffDelay(this.policy, attempt), signal);
      } catch (error) {
        const message = error instanceof AbortedError ? "Request aborted" : errorMessage(error);
        return { ok: false, message };
      }
    }

    logger.error("upstream request gave up", {
      method,
      path,
      status: lastFailure.ok ? undefined : lastFailure.status,
      message: lastFailure.ok ? undefined : lastFailure.message
    });
    return lastFailure;
  }
}
