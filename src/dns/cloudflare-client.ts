import { recordKindFor } from "./address.js";
import type { AddressRecordKind, DnsProvider, DnsRecord } from "./types.js";

/** Cloudflare API response types (only what we need) */
export interface CloudflareDnsRecord {
  id: string;
  name: string;
  type: string;
  content: string;
  ttl: number;
  proxied?: boolean;
}

interface CloudflareResultInfo {
  page: number;
  per_page: number;
  total_pages: number;
  count: number;
  total_count: number;
}

interface CloudflareEnvelope<T> {
  success: boolean;
  errors: Array<{ code: number; message: string }>;
  result: T;
  result_info?: CloudflareResultInfo;
}

export class CloudflareApiError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly cfMessage: string,
  ) {
    super(`Cloudflare API error ${statusCode}: ${cfMessage}`);
    this.name = "CloudflareApiError";
  }
}

export interface CloudflareClientOptions {
  apiToken: string;
  zoneId: string;
  /** Fully-qualified hostname whose records are managed. */
  recordName: string;
  /** 1 means automatic. */
  ttl?: number;
  proxied?: boolean;
  baseUrl?: string;
}

const DEFAULT_BASE_URL = "https://api.cloudflare.com/client/v4";
const PAGE_SIZE = 100;

function isAddressKind(type: string): type is AddressRecordKind {
  return type === "A" || type === "AAAA";
}

function toDnsRecord(record: CloudflareDnsRecord & { type: AddressRecordKind }): DnsRecord {
  return {
    id: record.id,
    name: record.name,
    recordKind: record.type,
    content: record.content,
    ttl: record.ttl,
  };
}

/**
 * Cloudflare DNS client scoped to one zone and one hostname.
 */
export class CloudflareClient implements DnsProvider {
  private readonly baseUrl: string;
  private readonly token: string;
  private readonly zoneId: string;
  private readonly recordName: string;
  private readonly ttl: number;
  private readonly proxied: boolean;

  constructor(options: CloudflareClientOptions) {
    if (options.ttl !== undefined && options.ttl < 0) {
      throw new Error(`DNS record TTL must not be negative, got ${options.ttl}`);
    }
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.token = options.apiToken;
    this.zoneId = options.zoneId;
    this.recordName = options.recordName;
    this.ttl = options.ttl ?? 1;
    this.proxied = options.proxied ?? false;
  }

  /** List every A and AAAA record for the hostname, across all pages. */
  async listAddressRecords(signal?: AbortSignal): Promise<DnsRecord[]> {
    const records: DnsRecord[] = [];
    let page = 1;
    for (;;) {
      const query = new URLSearchParams({
        name: this.recordName,
        page: String(page),
        per_page: String(PAGE_SIZE),
      });
      const envelope = await this.request<CloudflareDnsRecord[]>(
        "GET",
        `/zones/${this.zoneId}/dns_records?${query.toString()}`,
        undefined,
        signal,
      );

      for (const record of envelope.result) {
        const type = record.type;
        if (isAddressKind(type)) records.push(toDnsRecord({ ...record, type }));
      }

      const totalPages = envelope.result_info?.total_pages ?? 1;
      if (page >= totalPages || envelope.result.length === 0) break;
      page++;
    }
    return records;
  }

  /** Create an A (IPv4) or AAAA (IPv6) record pointing at the address. */
  async createAddressRecord(address: string, signal?: AbortSignal): Promise<DnsRecord> {
    const envelope = await this.request<CloudflareDnsRecord>(
      "POST",
      `/zones/${this.zoneId}/dns_records`,
      this.recordBody(address),
      signal,
    );
    return this.checkedRecord(envelope.result);
  }

  /** Point an existing record at a new address. */
  async updateAddressRecord(recordId: string, address: string, signal?: AbortSignal): Promise<DnsRecord> {
    const envelope = await this.request<CloudflareDnsRecord>(
      "PUT",
      `/zones/${this.zoneId}/dns_records/${encodeURIComponent(recordId)}`,
      this.recordBody(address),
      signal,
    );
    return this.checkedRecord(envelope.result);
  }

  async deleteAddressRecord(recordId: string, signal?: AbortSignal): Promise<void> {
    await this.request<{ id: string }>(
      "DELETE",
      `/zones/${this.zoneId}/dns_records/${encodeURIComponent(recordId)}`,
      undefined,
      signal,
    );
  }

  private recordBody(address: string) {
    return {
      type: recordKindFor(address),
      name: this.recordName,
      content: address,
      ttl: this.ttl,
      proxied: this.proxied,
    };
  }

  private checkedRecord(record: CloudflareDnsRecord): DnsRecord {
    const type = record.type;
    if (!isAddressKind(type)) {
      throw new CloudflareApiError(200, `unexpected record type ${type} for ${record.name}`);
    }
    return toDnsRecord({ ...record, type });
  }

  private headers(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.token}`,
      "Content-Type": "application/json",
    };
  }

  private async request<T>(
    method: "GET" | "POST" | "PUT" | "DELETE",
    path: string,
    body: unknown,
    signal?: AbortSignal,
  ): Promise<CloudflareEnvelope<T>> {
    const res = await fetch(`${this.baseUrl}${path}`, {
      method,
      headers: this.headers(),
      body: body === undefined ? undefined : JSON.stringify(body),
      signal,
    });

    const envelope = (await res.json().catch(() => null)) as CloudflareEnvelope<T> | null;
    if (!res.ok || !envelope?.success) {
      const message = envelope?.errors?.map((e) => `${e.message} (${e.code})`).join("; ") || res.statusText;
      throw new CloudflareApiError(res.status, message);
    }
    return envelope;
  }
}
