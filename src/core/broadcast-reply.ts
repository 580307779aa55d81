/**
 * BroadcastReply — one reply over the per-worker replies of a broadcast.
 *
 * Finished once every child has finished; successful only when every
 * child succeeded. The child list is fixed at construction, in the pool's
 * worker order at broadcast time.
 *
 * A broadcast that reached no worker finishes immediately and
 * unsuccessfully; {@link BroadcastReply.isEmpty} distinguishes that case
 * from a broadcast whose workers failed.
 */

import type { OperationName, ResponseOf } from '../types/protocol.js';
import type { Envelope } from './envelope.js';
import { Reply, type ReplyOptions } from './reply.js';

export class BroadcastReply<K extends OperationName = OperationName> extends Reply<K> {
  readonly replies: readonly Reply<K>[];

  constructor(message: Envelope<K>, replies: readonly Reply<K>[], options?: ReplyOptions) {
    super(message, options);
    this.replies = [...replies];

    if (this.replies.length === 0) {
      this.transition(false);
      return;
    }

    for (const reply of this.replies) {
      reply.onFinished(() => this.childFinished());
    }
  }

  get isEmpty(): boolean {
    return this.replies.length === 0;
  }

  /** Number of children that have finished successfully so far. */
  get successCount(): number {
    return this.replies.filter((reply) => reply.isSuccessful()).length;
  }

  /** Responses of the answered children, in child order. */
  responses(): ResponseOf<K>[] {
    return this.replies
      .filter((reply) => reply.isSuccessful() && reply.message.answered)
      .map((reply) => reply.message.response);
  }

  /** Release this reply and every child. */
  override release(): void {
    super.release();
    for (const reply of this.replies) {
      reply.release();
    }
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  /** Recompute the barrier; the last child to finish completes this reply. */
  private async childFinished(): Promise<void> {
    if (this.isFinished() || this.isReleased) return;
    if (!this.replies.every((reply) => reply.isFinished())) return;

    const success = this.successCount === this.replies.length;
    this.logger.debug('broadcast finished', {
      correlation: this.id,
      operation: this.operation,
      ok: success,
      children: this.replies.length,
    });
    await this.finish(success);
  }
}
