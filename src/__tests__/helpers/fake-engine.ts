import { defaultEngineConfig } from "../../engines/index.js";
import type { Engine, EngineConfig, EngineName, EngineRequest } from "../../engines/types.js";
import type { HeaderMultimap, Response } from "../../types.js";
import { createLogger } from "../../utils/logger.js";

export const silentLogger = createLogger("test", "silent");

export interface ScriptedResponse {
  status: number;
  headers?: HeaderMultimap;
  body?: string;
}

export type Step = ScriptedResponse | Error;

/**
 * Engine that replays scripted responses and records every request
 */
export class FakeEngine implements Engine {
  readonly name: EngineName;
  readonly config: EngineConfig;
  readonly requests: EngineRequest[] = [];
  closed = false;
  /** Proxy lists passed to retainProxies, in call order */
  readonly retained: string[][] = [];
  private readonly steps: Step[];
  private fallback?: Step;

  constructor(config: EngineConfig = defaultEngineConfig("http"), steps: Step[] = []) {
    this.config = config;
    this.name = config.kind;
    this.steps = [...steps];
  }

  /** Queue steps, replayed in order */
  enqueue(...steps: Step[]): this {
    this.steps.push(...steps);
    return this;
  }

  /** Step used once the queue is empty */
  always(step: Step): this {
    this.fallback = step;
    return this;
  }

  get urls(): string[] {
    return this.requests.map((r) => r.url);
  }

  async send(request: EngineRequest): Promise<Response> {
    this.requests.push(request);
    const step = this.steps.shift() ?? this.fallback;
    if (!step) {
      throw new Error(`No scripted response for ${request.method} ${request.url}`);
    }
    if (step instanceof Error) {
      throw step;
    }
    return {
      status: step.status,
      statusText: "",
      headers: step.headers ?? {},
      body: step.body ?? "",
      url: request.url,
      requestUrl: request.url,
      engine: this.name,
      duration: 0,
    };
  }

  async retainProxies(proxyUrls: readonly string[]): Promise<void> {
    this.retained.push([...proxyUrls]);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/**
 * Engine factory that hands out FakeEngines and remembers them
 */
export function fakeEngineFactory(prepare?: (engine: FakeEngine) => void) {
  const engines: FakeEngine[] = [];
  const factory = (config: EngineConfig): FakeEngine => {
    const engine = new FakeEngine(config);
    prepare?.(engine);
    engines.push(engine);
    return engine;
  };
  return { factory, engines };
}

export function redirect(location: string, status = 302, headers: HeaderMultimap = {}): ScriptedResponse {
  return { status, headers: { ...headers, location: [location] } };
}
