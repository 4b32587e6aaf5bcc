/**
 * @fileoverview Runtime context handed to every handler invocation
 * @module runtime/context
 *
 * Everything here is fixed at startup except `lastExecutionAt`, which the
 * poll loop sets after each successful publish. The same instance is passed
 * to every call, so a handler can read when its previous result landed.
 */

export interface RuntimeContextInit {
  readonly storeHost: string;
  readonly storePort: number;
  readonly inputKey: string;
  readonly outputKey: string;
  readonly handlerSourceModifiedAt: Date;
}

/**
 * Plain snapshot of a context, for logs and JSON output
 */
export interface RuntimeContextSnapshot {
  storeHost: string;
  storePort: number;
  inputKey: string;
  outputKey: string;
  handlerSourceModifiedAt: string;
  lastExecutionAt: string | null;
}

export class RuntimeContext {
  readonly storeHost: string;
  readonly storePort: number;
  readonly inputKey: string;
  readonly outputKey: string;
  /** Handler file mtime at load; not compared against the live file */
  readonly handlerSourceModifiedAt: Date;
  /** Free-form space the handler may use to carry state between calls */
  readonly environment: Record<string, unknown> = {};

  private lastExecution: Date | undefined;

  constructor(init: RuntimeContextInit) {
    this.storeHost = init.storeHost;
    this.storePort = init.storePort;
    this.inputKey = init.inputKey;
    this.outputKey = init.outputKey;
    this.handlerSourceModifiedAt = init.handlerSourceModifiedAt;
  }

  /** Time of the last successful publish, if any */
  get lastExecutionAt(): Date | undefined {
    return this.lastExecution;
  }

  /**
   * Marks a successful publish. Only the poll loop calls this.
   */
  recordExecution(at: Date): void {
    this.lastExecution = at;
  }

  toJSON(): RuntimeContextSnapshot {
    return {
      storeHost: this.storeHost,
      storePort: this.storePort,
      inputKey: this.inputKey,
      outputKey: this.outputKey,
      handlerSourceModifiedAt: this.handlerSourceModifiedAt.toISOString(),
      lastExecutionAt: this.lastExecution?.toISOString() ?? null,
    };
  }
}
