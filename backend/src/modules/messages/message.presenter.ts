/**
 * backend/src/modules/messages/message.presenter.ts
 */

import type { Message } from './message.types';

export type MessageResponse = {
  id: string;
  subject: string;
  body: string;
  read: boolean;
  inboxId: string;
  createdAt: string;
  updatedAt: string;
};

export function toMessageResponse(message: Message): MessageResponse {
  return {
    id: message.id,
    subject: message.subject,
    body: message.body,
    read: message.read,
    inboxId: message.inboxId,
    createdAt: message.createdAt.toISOString(),
    updatedAt: message.updatedAt.toISOString(),
  };
}
