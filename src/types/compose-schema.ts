/**
 * Runtime JSON Schema for the subset of the Compose format the loader
 * honors, validated with ajv after interpolation and before
 * normalization.
 *
 * Keys outside the subset are allowed and ignored, so full Compose files
 * still load. Kept as a plain object so it can be fed directly to
 * `new Ajv().compile(COMPOSE_JSON_SCHEMA)`.
 */

// ---------------------------------------------------------------------------
// Document shapes accepted by the schema
// ---------------------------------------------------------------------------

export type RawScalar = string | number | boolean | null;

/** `["KEY=VALUE", "KEY"]` or `{ KEY: value }`. */
export type RawListOrDict = string[] | Record<string, RawScalar>;

export type RawPort =
  | number
  | string
  | { target: number | string; published?: number | string; protocol?: string; host_ip?: string };

export type RawVolume =
  | string
  | { type?: string; source?: string; target: string; read_only?: boolean };

export type RawDevice = string | { source: string; target?: string; permissions?: string };

export interface RawServiceNetwork {
  aliases?: string[];
  ipv4_address?: string;
  ipv6_address?: string;
  driver_opts?: Record<string, string | number | boolean>;
}

export interface RawHealthcheck {
  test?: string | string[];
  interval?: string | number;
  timeout?: string | number;
  start_period?: string | number;
  start_interval?: string | number;
  retries?: number;
  disable?: boolean;
}

export interface RawService {
  image?: string;
  build?: string | { context?: string; dockerfile?: string };
  command?: string | string[] | null;
  entrypoint?: string | string[] | null;
  environment?: RawListOrDict;
  ports?: RawPort[];
  volumes?: RawVolume[];
  networks?: string[] | Record<string, RawServiceNetwork | null>;
  healthcheck?: RawHealthcheck;
  mem_limit?: string | number;
  mem_reservation?: string | number;
  memswap_limit?: string | number;
  cpus?: number | string;
  cpu_shares?: number;
  cpu_quota?: number;
  cpuset?: string;
  shm_size?: string | number;
  privileged?: boolean;
  cap_add?: string[];
  cap_drop?: string[];
  security_opt?: string[];
  extra_hosts?: RawListOrDict;
  devices?: RawDevice[];
  working_dir?: string;
  user?: string;
  init?: boolean;
  labels?: RawListOrDict;
  network_mode?: string;
}

export interface RawResource {
  name?: string;
  external?: boolean;
  driver?: string;
  driver_opts?: Record<string, string | number | boolean>;
  labels?: RawListOrDict;
}

/** A merged Compose document, after interpolation. */
export interface RawComposeFile {
  name?: string;
  services: Record<string, RawService>;
  volumes?: Record<string, RawResource | null>;
  networks?: Record<string, RawResource | null>;
}

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const scalar = { type: ['string', 'number', 'boolean', 'null'] };

export const COMPOSE_JSON_SCHEMA = {
  type: 'object' as const,
  required: ['services'],

  $defs: {
    stringOrList: {
      oneOf: [{ type: 'string' }, { type: 'array', items: { type: 'string' } }],
    },

    listOrDict: {
      oneOf: [
        { type: 'array', items: { type: 'string' } },
        { type: 'object', additionalProperties: scalar },
      ],
    },

    stringList: { type: 'array', items: { type: 'string' } },

    stringMap: { type: 'object', additionalProperties: { type: ['string', 'number', 'boolean'] } },

    /** `1m30s`, or a number of seconds. */
    duration: { type: ['string', 'number'] },

    /** `512m`, or a number of bytes. */
    byteSize: { type: ['string', 'number'] },

    port: {
      oneOf: [
        { type: 'number' },
        { type: 'string' },
        {
          type: 'object',
          required: ['target'],
          properties: {
            target: { type: ['integer', 'string'] },
            published: { type: ['integer', 'string'] },
            protocol: { type: 'string' },
            host_ip: { type: 'string' },
          },
        },
      ],
    },

    volume: {
      oneOf: [
        { type: 'string' },
        {
          type: 'object',
          required: ['target'],
          properties: {
            type: { type: 'string' },
            source: { type: 'string' },
            target: { type: 'string' },
            read_only: { type: 'boolean' },
          },
        },
      ],
    },

    device: {
      oneOf: [
        { type: 'string' },
        {
          type: 'object',
          required: ['source'],
          properties: {
            source: { type: 'string' },
            target: { type: 'string' },
            permissions: { type: 'string' },
          },
        },
      ],
    },

    serviceNetwork: {
      oneOf: [
        { type: 'null' },
        {
          type: 'object',
          properties: {
            aliases: { $ref: '#/$defs/stringList' },
            ipv4_address: { type: 'string' },
            ipv6_address: { type: 'string' },
            driver_opts: { $ref: '#/$defs/stringMap' },
          },
        },
      ],
    },

    healthcheck: {
      type: 'object',
      properties: {
        test: { $ref: '#/$defs/stringOrList' },
        interval: { $ref: '#/$defs/duration' },
        timeout: { $ref: '#/$defs/duration' },
        start_period: { $ref: '#/$defs/duration' },
        start_interval: { $ref: '#/$defs/duration' },
        retries: { type: 'integer', minimum: 0 },
        disable: { type: 'boolean' },
      },
    },

    service: {
      type: 'object',
      properties: {
        image: { type: 'string' },
        build: {
          oneOf: [
            { type: 'string' },
            {
              type: 'object',
              properties: { context: { type: 'string' }, dockerfile: { type: 'string' } },
            },
          ],
        },
        command: { oneOf: [{ $ref: '#/$defs/stringOrList' }, { type: 'null' }] },
        entrypoint: { oneOf: [{ $ref: '#/$defs/stringOrList' }, { type: 'null' }] },
        environment: { $ref: '#/$defs/listOrDict' },
        ports: { type: 'array', items: { $ref: '#/$defs/port' } },
        volumes: { type: 'array', items: { $ref: '#/$defs/volume' } },
        networks: {
          oneOf: [
            { $ref: '#/$defs/stringList' },
            { type: 'object', additionalProperties: { $ref: '#/$defs/serviceNetwork' } },
          ],
        },
        healthcheck: { $ref: '#/$defs/healthcheck' },

        mem_limit: { $ref: '#/$defs/byteSize' },
        mem_reservation: { $ref: '#/$defs/byteSize' },
        memswap_limit: { $ref: '#/$defs/byteSize' },
        cpus: { type: ['number', 'string'] },
        cpu_shares: { type: 'integer' },
        cpu_quota: { type: 'integer' },
        cpuset: { type: 'string' },
        shm_size: { $ref: '#/$defs/byteSize' },

        privileged: { type: 'boolean' },
        cap_add: { $ref: '#/$defs/stringList' },
        cap_drop: { $ref: '#/$defs/stringList' },
        security_opt: { $ref: '#/$defs/stringList' },
        extra_hosts: { $ref: '#/$defs/listOrDict' },
        devices: { type: 'array', items: { $ref: '#/$defs/device' } },

        working_dir: { type: 'string' },
        user: { type: 'string' },
        init: { type: 'boolean' },
        labels: { $ref: '#/$defs/listOrDict' },
        network_mode: { type: 'string' },
      },
    },

    resource: {
      oneOf: [
        { type: 'null' },
        {
          type: 'object',
          properties: {
            name: { type: 'string' },
            external: { type: 'boolean' },
            driver: { type: 'string' },
            driver_opts: { $ref: '#/$defs/stringMap' },
            labels: { $ref: '#/$defs/listOrDict' },
          },
        },
      ],
    },
  },

  properties: {
    name: { type: 'string' },
    services: {
      type: 'object',
      additionalProperties: { $ref: '#/$defs/service' },
    },
    volumes: { type: 'object', additionalProperties: { $ref: '#/$defs/resource' } },
    networks: { type: 'object', additionalProperties: { $ref: '#/$defs/resource' } },
  },
};
