/**
 * backend/src/modules/messages/message.types.ts
 *
 * WHY:
 * - Domain types for the Messages module.
 * - A message belongs to exactly one inbox; ownership is the inbox's owner.
 */

export type MessageId = string;

export type Message = {
  id: MessageId;
  inboxId: string;
  subject: string;
  body: string;
  read: boolean;

  createdAt: Date;
  updatedAt: Date;
};
