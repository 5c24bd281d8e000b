import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AsyncLocalStorage } from 'async_hooks';
import {
  ContextAlreadyActiveError,
  EventRecord,
  FieldMap,
  MetricsContext,
} from '@metrics/domain';
import { ExecutionIdentityPort } from '@metrics/out-ports';
import { NestingPolicy } from '@metrics/value-objects';

interface ContextFrame {
  readonly context: MetricsContext;
  /** The binding this one shadows (permissive policy only). */
  readonly previous: ContextFrame | undefined;
}

/**
 * ContextService - Ambient metrics context per execution chain, using AsyncLocalStorage.
 *
 * Each request, job or script invocation sees only its own binding, across
 * async boundaries, without passing the context around. A binding stays in
 * effect for everything `run()` starts, and stops counting once its context
 * has closed.
 */
@Injectable()
export class ContextService {
  private readonly asyncLocalStorage = new AsyncLocalStorage<ContextFrame>();
  readonly nestingPolicy: NestingPolicy;

  constructor(
    private readonly identity: ExecutionIdentityPort,
    private readonly configService: ConfigService,
  ) {
    this.nestingPolicy = this.configService.get<NestingPolicy>(
      'metrics.nestingPolicy',
      NestingPolicy.STRICT,
    );
  }

  /**
   * Throws ContextAlreadyActiveError if the policy forbids opening a context
   * here. Returns the context a new one would shadow.
   */
  assertCanInstall(): MetricsContext | undefined {
    const active = this.activeFrame();
    if (active && this.nestingPolicy === NestingPolicy.STRICT) {
      throw new ContextAlreadyActiveError(this.identity.current());
    }
    return active?.context;
  }

  /**
   * Bind `context` for the execution chain of `fn`.
   */
  run<T>(context: MetricsContext, fn: () => T): T {
    this.assertCanInstall();
    return this.asyncLocalStorage.run(
      { context, previous: this.activeFrame() },
      fn,
    );
  }

  /**
   * The innermost open context, or undefined outside of any.
   */
  current(): MetricsContext | undefined {
    return this.activeFrame()?.context;
  }

  currentEvents(): EventRecord[] | undefined {
    return this.current()?.events;
  }

  currentFields(): FieldMap | undefined {
    return this.current()?.fields;
  }

  /**
   * Number of open contexts visible here (at most 1 under the strict policy).
   */
  depth(): number {
    let depth = 0;
    for (let frame = this.activeFrame(); frame; frame = this.openFrom(frame.previous)) {
      depth++;
    }
    return depth;
  }

  private activeFrame(): ContextFrame | undefined {
    return this.openFrom(this.asyncLocalStorage.getStore());
  }

  private openFrom(frame: ContextFrame | undefined): ContextFrame | undefined {
    let candidate = frame;
    while (candidate && candidate.context.isClosed) {
      candidate = candidate.previous;
    }
    return candidate;
  }
}
