import * as crypto from "crypto";
import { DEFAULT_SAMPLE_COUNT } from "../config/constants.js";
import { ValidationError } from "../util/errors.js";
import { loadRecordTables, type RecordTables } from "./tables.js";

export type RecordId = number | string;

/**
 * Seeded PRNG (mulberry32). Stable across platforms and processes.
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function md5(input: string): Buffer {
  return crypto.createHash("md5").update(input).digest();
}

class Picker {
  constructor(private readonly rand: () => number) {}

  int(min: number, max: number): number {
    return min + Math.floor(this.rand() * (max - min + 1));
  }

  float(min: number, max: number): number {
    return min + this.rand() * (max - min);
  }

  bool(): boolean {
    return this.rand() < 0.5;
  }

  one<T>(items: readonly T[]): T {
    return items[Math.floor(this.rand() * items.length)];
  }

  /** `count` distinct items, order randomised. */
  sample<T>(items: readonly T[], count: number): T[] {
    const pool = [...items];
    const picked: T[] = [];
    while (picked.length < count && pool.length > 0) {
      picked.push(...pool.splice(Math.floor(this.rand() * pool.length), 1));
    }
    return picked;
  }
}

const round6 = (n: number): number => Math.round(n * 1e6) / 1e6;
const round2 = (n: number): number => Math.round(n * 100) / 100;

/**
 * Builds one synthetic geolocation record. Pure function of `identifier`.
 */
export function buildRecord(
  identifier: string,
  tables: RecordTables,
): Record<string, unknown> {
  const digest = md5(identifier);
  const ip = `${digest[0]}.${digest[1]}.${digest[2]}.${digest[3]}`;
  const geo = new Picker(seededRandom(digest.readUInt32BE(0)));
  const net = new Picker(seededRandom(md5(`network_${identifier}`).readUInt32BE(0)));

  const location = geo.one(tables.locations);
  const postalCode =
    location.countryCode === "US"
      ? `${location.zipCode}-${geo.int(1000, 9999)}`
      : location.zipCode;

  const networkType = net.one(tables.networkTypes);
  const domain = net.one(tables.domains);
  const asn = net.one(tables.asns);
  const hostLabel = `host-${ip.replaceAll(".", "-")}`;

  return {
    id: identifier,
    ip,
    network: `${digest[0]}.${digest[1]}.${digest[2]}.0/24`,
    countryCode: location.countryCode,
    countryName: location.countryName,
    state: location.state,
    city: location.city,
    zipCode: location.zipCode,
    latitude: round6(location.lat + geo.float(-0.1, 0.1)),
    longitude: round6(location.lng + geo.float(-0.1, 0.1)),
    region: geo.one(tables.regions),
    postalCode,
    areaCode: String(geo.int(200, 999)),
    metroCode: geo.int(500, 900),
    timezoneId: location.tz,
    utcOffset: location.utcOffset,
    dstActive: geo.bool(),
    networkType,
    isp: net.one(tables.isps),
    organization: net.one(tables.organizations),
    asn: asn.asn,
    asnName: asn.name,
    connectionType: net.one(tables.connectionTypes),
    usageType: net.one(tables.usageTypes),
    domain,
    hostname: `${hostLabel}.${domain}`,
    carrier: networkType === "mobile" ? net.one(tables.carriers) : "",
    lineSpeed: net.one(tables.lineSpeeds),
    staticIp: net.bool(),
    vpnDetected: net.bool(),
    proxyDetected: net.bool(),
    reputationScore: round2(net.float(0, 100)),
    lastSeenMalware: net.float(0, 1) > 0.3 ? "never" : tables.lastUpdated,
    bandwidthTier: net.one(tables.bandwidthTiers),
    estimatedUsers: net.int(1, 500),
    gdprApplicable: net.bool(),
    dataRetentionDays: net.one(tables.retentionDays),
    privacyLevel: net.one(tables.privacyLevels),
    ipVersion: 4,
    subnetMask: "255.255.255.0",
    gateway: `${digest[0]}.${digest[1]}.${digest[2]}.1`,
    dnsServers: net.sample(tables.dnsServers, net.int(2, 4)),
    notes: net.one(tables.noteTemplates),
    tags: net.sample(tables.tags, net.int(2, 5)),
    customFields: {
      scanFrequency: net.one(tables.scanFrequencies),
      monitoringLevel: net.one(tables.monitoringLevels),
      complianceStatus: net.one(tables.complianceStatuses),
      lastUpdated: tables.lastUpdated,
      dataSource: tables.dataSource,
    },
  };
}

export interface RecordSourceOptions {
  sampleCount?: number;
  tables?: RecordTables;
}

/**
 * Serialized synthetic records. Numeric ids cycle through a fixed sample set
 * built once per instance, so payload lookup on the write path is O(1).
 */
export class RecordSource {
  readonly sampleCount: number;
  private readonly tables: RecordTables;
  private readonly samples: string[];

  constructor(options: RecordSourceOptions = {}) {
    this.sampleCount = options.sampleCount ?? DEFAULT_SAMPLE_COUNT;
    if (!Number.isInteger(this.sampleCount) || this.sampleCount < 1) {
      throw new ValidationError("sampleCount must be a positive integer");
    }
    this.tables = options.tables ?? loadRecordTables();
    this.samples = Array.from({ length: this.sampleCount }, (_, index) =>
      JSON.stringify(buildRecord(String(index), this.tables)),
    );
  }

  generate(id: RecordId): string {
    if (typeof id === "string") {
      return JSON.stringify(buildRecord(id, this.tables));
    }
    if (!Number.isInteger(id) || id < 0) {
      throw new ValidationError(`Record id must be a non-negative integer: ${id}`);
    }
    return this.samples[id % this.sampleCount];
  }

  averagePayloadBytes(): number {
    const total = this.samples.reduce(
      (sum, sample) => sum + Buffer.byteLength(sample, "utf-8"),
      0,
    );
    return total / this.samples.length;
  }
}
