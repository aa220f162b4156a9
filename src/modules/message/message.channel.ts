/**
 * =============================================================================
 * MESSAGE MODULE - CHANNEL
 * =============================================================================
 *
 * Load-scoped messaging between the load's parties.
 *
 * PARTIES of a load:
 * - the shipper who posted it
 * - the assigned trucker
 * - any trucker with a pending or accepted bid on it
 * Admins may message anyone about any load and read every thread.
 *
 * Delivery is pull-based: clients re-read the thread to see new messages.
 * =============================================================================
 */

import { v4 as uuid } from 'uuid';
import { db, DatabaseService, LoadRecord, MessageRecord, Tables, UserRecord } from '../../shared/database/db';
import { IBidLedger } from '../../shared/database/repository.interface';
import { logger } from '../../shared/services/logger.service';
import {
  AuthorizationError,
  NotFoundError,
  ValidationError
} from '../../shared/types/error.types';
import type { Actor } from '../../shared/types/api.types';
import { validateSchema } from '../../shared/utils/validation.utils';
import { bidLedger } from '../bid/bid.ledger';
import { sendMessageSchema } from './message.schema';

function oldestFirst(messages: MessageRecord[]): MessageRecord[] {
  return messages.sort((a, b) => a.createdAt.localeCompare(b.createdAt));
}

export class MessagingChannel {
  constructor(
    private readonly db: DatabaseService,
    private readonly bids: IBidLedger
  ) {}

  /**
   * Whether `user` is a party to `load` (admins always are)
   */
  isParty(tables: Readonly<Tables>, load: LoadRecord, user: Pick<UserRecord, 'id' | 'role'>): boolean {
    if (user.role === 'admin') return true;
    if (load.shipperId === user.id) return true;
    if (load.assignedTruckerId === user.id) return true;
    return user.role === 'trucker' && this.bids.hasActiveBid(tables, load.id, user.id);
  }

  /**
   * Send a message about a load
   */
  async send(loadId: string, sender: Actor, recipientId: string, body: string): Promise<MessageRecord> {
    const input = validateSchema(sendMessageSchema, { recipientId, body }, 'Invalid message');

    if (input.recipientId === sender.userId) {
      throw new ValidationError('You cannot send a message to yourself', {
        fields: [{ field: 'recipientId', message: 'Recipient must be another user' }]
      });
    }

    const message = this.db.transaction(tx => {
      const load = tx.loads.find(l => l.id === loadId);
      if (!load) {
        throw new NotFoundError('Load');
      }
      const recipient = tx.users.find(u => u.id === input.recipientId);
      if (!recipient) {
        throw new NotFoundError('Recipient');
      }

      const senderUser = { id: sender.userId, role: sender.role };
      const adminInvolved = sender.role === 'admin' || recipient.role === 'admin';
      const bothParties = this.isParty(tx, load, senderUser) && this.isParty(tx, load, recipient);

      if (!adminInvolved && !bothParties) {
        throw new AuthorizationError('Messages can only be exchanged between parties to this load');
      }

      const record: MessageRecord = {
        id: uuid(),
        loadId,
        senderId: sender.userId,
        recipientId: recipient.id,
        body: input.body,
        createdAt: new Date().toISOString()
      };
      tx.messages.push(record);
      return record;
    });

    logger.info(`Message sent on load ${loadId}`, { senderId: sender.userId, recipientId: message.recipientId });
    return message;
  }

  /**
   * Messages on a load, oldest first. Access is checked here, when the
   * thread is opened; every iteration re-reads the committed messages
   * from the start.
   *
   * Shippers and admins see the whole load; a trucker sees only the
   * messages they sent or received.
   */
  thread(loadId: string, actor: Actor): Iterable<MessageRecord> {
    const { load, allowed } = this.db.read(tables => {
      const found = tables.loads.find(l => l.id === loadId);
      return {
        load: found,
        allowed: found ? this.isParty(tables, found, { id: actor.userId, role: actor.role }) : false
      };
    });

    if (!load) {
      throw new NotFoundError('Load');
    }
    if (!allowed) {
      throw new AuthorizationError('Only parties to this load can read its messages');
    }

    const seesAll = actor.role === 'admin' || load.shipperId === actor.userId;
    const database = this.db;

    return {
      *[Symbol.iterator](): Iterator<MessageRecord> {
        const messages = database.read(tables => tables.messages.filter(m =>
          m.loadId === loadId &&
          (seesAll || m.senderId === actor.userId || m.recipientId === actor.userId)
        ));
        yield* oldestFirst(messages);
      }
    };
  }

  /**
   * Messages received by the actor across all loads, newest first
   */
  inbox(actor: Actor): MessageRecord[] {
    return this.db
      .read(tables => tables.messages.filter(m => m.recipientId === actor.userId))
      .reverse()
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  }
}

export const messagingChannel = new MessagingChannel(db, bidLedger);
