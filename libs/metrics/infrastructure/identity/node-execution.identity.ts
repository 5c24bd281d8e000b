import { Injectable } from '@nestjs/common';
import { isMainThread, threadId } from 'worker_threads';
import { ExecutionIdentityPort } from '@metrics/out-ports';

@Injectable()
export class NodeExecutionIdentity extends ExecutionIdentityPort {
  current(): string {
    return isMainThread ? 'main' : `worker-${threadId}`;
  }
}
