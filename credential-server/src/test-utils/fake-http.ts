/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * In-process stand-ins for the HTTP services the broker talks to: a
 * scriptable transport, and a Vault KV v2 emulation built on it.
 */

import { GaxiosError, type GaxiosOptions, type RetryConfig } from "gaxios";

import type { HttpResponse, HttpTransport } from "../utils/http-options";
import { isRecord } from "../utils/type-guards";


export interface RecordedRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
  params: Record<string, unknown>;
  data: unknown;
  retryConfig?: RetryConfig;
}


export type Responder = (request: RecordedRequest) => HttpResponse | Promise<HttpResponse>;


interface Route {
  method: string;
  url: string;
  prefix: boolean;
  responders: Responder[];
}


function toStringRecord(value: unknown): Record<string, string> {
  const out: Record<string, string> = {};
  if (isRecord(value)) {
    for (const [key, entry] of Object.entries(value)) {
      out[key] = String(entry);
    }
  }
  return out;
}


/**
 * Routes requests by method and URL. A route answers with its responders in
 * order and keeps repeating the last one.
 */
export class FakeHttp {
  readonly requests: RecordedRequest[] = [];
  private readonly routes: Route[] = [];

  on(method: string, url: string, ...responders: Array<Responder | HttpResponse>): this {
    this.routes.push({ method, url, prefix: false, responders: responders.map(toResponder) });
    return this;
  }

  onPrefix(method: string, urlPrefix: string, responder: Responder): this {
    this.routes.push({ method, url: urlPrefix, prefix: true, responders: [responder] });
    return this;
  }

  requestsTo(url: string): RecordedRequest[] {
    return this.requests.filter((request) => request.url === url);
  }

  readonly transport: HttpTransport = async (options: GaxiosOptions) => {
    const request: RecordedRequest = {
      method: (options.method ?? "GET").toUpperCase(),
      url: String(options.url),
      headers: toStringRecord(options.headers),
      params: isRecord(options.params) ? options.params : {},
      data: options.data,
      retryConfig: options.retryConfig,
    };
    this.requests.push(request);

    const route = this.routes.find(
      (candidate) =>
        candidate.method === request.method &&
        (candidate.prefix ? request.url.startsWith(candidate.url) : candidate.url === request.url)
    );
    if (!route) {
      throw new Error(`No fake route for ${request.method} ${request.url}`);
    }

    const calls = this.requests.filter(
      (previous) => previous.method === route.method && previous.url === request.url
    ).length;
    const responder = route.responders[Math.min(calls, route.responders.length) - 1];
    if (!responder) {
      throw new Error(`Fake route for ${request.method} ${request.url} has no responder`);
    }
    return responder(request);
  };
}


function toResponder(value: Responder | HttpResponse): Responder {
  return typeof value === "function" ? value : () => value;
}


export function json(status: number, data: unknown): HttpResponse {
  return { status, data };
}


export function networkError(message = "socket hang up"): Responder {
  return () => {
    throw new Error(message);
  };
}


/**
 * Fails the way gaxios does once a 5xx answer has used up its retries.
 */
export function serverError(status: number, data: unknown): Responder {
  return (request) => {
    const config: GaxiosOptions = { url: request.url };
    throw new GaxiosError(`Request failed with status code ${status}`, config, {
      config,
      data,
      status,
      statusText: "",
      headers: {},
      request: { responseURL: request.url },
    });
  };
}


interface VaultSecret {
  data: Record<string, unknown>;
  version: number;
}


/**
 * Minimal Vault KV v2 server: data reads and check-and-set writes, metadata
 * listing and metadata deletion. Deleting metadata drops every version, so
 * the next write starts again at version 1.
 */
export class FakeVault {
  readonly secrets = new Map<string, VaultSecret>();
  /**
   * When set, every request fails as if the server were unreachable.
   */
  down = false;

  constructor(
    readonly http: FakeHttp,
    readonly address = "http://vault.test:8200",
    readonly mount = "secret"
  ) {
    const dataPrefix = `${address}/v1/${mount}/data/`;
    const metadataPrefix = `${address}/v1/${mount}/metadata/`;

    http.onPrefix("GET", dataPrefix, (req) => this.guard(() => this.read(req.url.slice(dataPrefix.length))));
    http.onPrefix("POST", dataPrefix, (req) =>
      this.guard(() => this.write(req.url.slice(dataPrefix.length), req.data))
    );
    http.onPrefix("GET", metadataPrefix, (req) =>
      this.guard(() =>
        req.params["list"] === "true"
          ? this.list(req.url.slice(metadataPrefix.length))
          : this.metadata(req.url.slice(metadataPrefix.length))
      )
    );
    http.onPrefix("DELETE", metadataPrefix, (req) =>
      this.guard(() => {
        this.secrets.delete(req.url.slice(metadataPrefix.length));
        return json(204, "");
      })
    );
    http.on("GET", `${address}/v1/auth/token/lookup-self`, () =>
      this.guard(() => json(200, { data: { id: "test-token" } }))
    );
  }

  private guard(handler: () => HttpResponse): HttpResponse {
    if (this.down) {
      throw new Error("connect ECONNREFUSED");
    }
    return handler();
  }

  private read(path: string): HttpResponse {
    const secret = this.secrets.get(path);
    if (!secret) {
      return json(404, { errors: [] });
    }
    return json(200, {
      data: {
        data: structuredClone(secret.data),
        metadata: { version: secret.version, destroyed: false, deletion_time: "" },
      },
    });
  }

  private write(path: string, body: unknown): HttpResponse {
    const data = isRecord(body) ? body["data"] : undefined;
    if (!isRecord(body) || !isRecord(data)) {
      return json(400, { errors: ["no data provided"] });
    }
    const current = this.secrets.get(path)?.version ?? 0;
    const options = body["options"];
    const cas = isRecord(options) ? options["cas"] : undefined;
    if (typeof cas === "number" && cas !== current) {
      return json(400, {
        errors: ["check-and-set parameter did not match the current version"],
      });
    }
    const version = current + 1;
    this.secrets.set(path, { data: structuredClone(data), version });
    return json(200, { data: { version } });
  }

  private metadata(path: string): HttpResponse {
    const secret = this.secrets.get(path);
    return secret
      ? json(200, { data: { current_version: secret.version } })
      : json(404, { errors: [] });
  }

  private list(path: string): HttpResponse {
    const prefix = `${path}/`;
    const keys = new Set<string>();
    for (const key of this.secrets.keys()) {
      if (key.startsWith(prefix)) {
        const rest = key.slice(prefix.length);
        const slash = rest.indexOf("/");
        keys.add(slash === -1 ? rest : `${rest.slice(0, slash + 1)}`);
      }
    }
    return keys.size === 0 ? json(404, { errors: [] }) : json(200, { data: { keys: [...keys] } });
  }
}
