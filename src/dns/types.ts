/** Record types this controller manages. */
export type AddressRecordKind = "A" | "AAAA";

/** A published address record. `id` is provider-assigned and only known after create or list. */
export interface DnsRecord {
  id: string;
  name: string;
  recordKind: AddressRecordKind;
  /** The address the record points at. */
  content: string;
  /** Never negative. */
  ttl: number;
}

/** Address record operations on the configured hostname. */
export interface DnsProvider {
  listAddressRecords(signal?: AbortSignal): Promise<DnsRecord[]>;
  createAddressRecord(address: string, signal?: AbortSignal): Promise<DnsRecord>;
  updateAddressRecord(recordId: string, address: string, signal?: AbortSignal): Promise<DnsRecord>;
  deleteAddressRecord(recordId: string, signal?: AbortSignal): Promise<void>;
}
