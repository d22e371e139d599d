export type Button = { text: string; data: string };

export type Keyboard =
  | { kind: "inline"; rows: Button[][] }
  // Persistent reply keyboard under the input box.
  | { kind: "menu"; rows: string[][] }
  | { kind: "remove" };

export type OutboundMessage =
  | { kind: "text"; text: string; keyboard?: Keyboard }
  | { kind: "document"; fileName: string; content: Buffer; caption?: string };

export type EventInput =
  | { kind: "command"; command: string }
  | { kind: "text"; text: string }
  | { kind: "callback"; data: string }
  | { kind: "photo"; fileId: string };

/** One user action, already stripped of transport details. */
export type InboundEvent = {
  userId: string;
  input: EventInput;
};

export type BotResponse = {
  messages: OutboundMessage[];
};

export const text = (body: string, keyboard?: Keyboard): OutboundMessage => ({ kind: "text", text: body, keyboard });
