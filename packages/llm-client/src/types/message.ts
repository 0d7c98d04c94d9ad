/**
 * Message types for the model-service client.
 *
 * The boundary is text-in/text-out: every message carries plain text only.
 */

import { Role } from "./enums.js";

/** A single conversation message. */
export interface Message {
  readonly role: Role;
  readonly content: string;
}

export function createSystemMessage(content: string): Message {
  return { role: Role.SYSTEM, content };
}

export function createUserMessage(content: string): Message {
  return { role: Role.USER, content };
}

export function createAssistantMessage(content: string): Message {
  return { role: Role.ASSISTANT, content };
}

/**
 * Split a message list into the leading system text and the rest.
 *
 * Several providers take the system prompt as a separate field; adjacent
 * system messages are joined with a blank line.
 */
export function splitSystemMessages(messages: readonly Message[]): {
  system: string;
  conversation: Message[];
} {
  const systemParts: string[] = [];
  const conversation: Message[] = [];
  for (const message of messages) {
    if (message.role === Role.SYSTEM) {
      systemParts.push(message.content);
    } else {
      conversation.push(message);
    }
  }
  return { system: systemParts.join("\n\n"), conversation };
}
