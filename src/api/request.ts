import { isImageAttachment, type ChatMessage, type MessageAttachment, type MessageRole } from "../chat-types.js";

export type InputContentPart =
  | { type: "input_text"; text: string }
  | { type: "input_image"; image_url: string; detail: "auto" | "low" | "high" }
  | { type: "input_file"; filename: string; file_data: string };

export type InputMessage = {
  type: "message";
  role: MessageRole;
  content: string | InputContentPart[];
};

/** Body of `POST /v1/responses`. */
export type ResponseRequest = {
  model: string;
  input: InputMessage[];
  instructions?: string;
  max_output_tokens?: number;
  previous_response_id?: string;
  temperature?: number;
  stream: boolean;
};

export type ResponseRequestParams = {
  model: string;
  input: InputMessage[];
  instructions?: string;
  maxOutputTokens?: number;
  previousResponseId?: string | null;
  temperature?: number;
  stream?: boolean;
};

export function buildResponseRequest(params: ResponseRequestParams): ResponseRequest {
  const model = params.model.trim();
  if (!model) {
    throw new Error("model must be a non-empty string");
  }

  const request: ResponseRequest = {
    model,
    input: params.input,
    stream: params.stream ?? true,
  };

  const instructions = params.instructions?.trim();
  if (instructions) {
    request.instructions = instructions;
  }
  if (params.maxOutputTokens !== undefined) {
    request.max_output_tokens = params.maxOutputTokens;
  }
  const previousResponseId = params.previousResponseId?.trim();
  if (previousResponseId) {
    request.previous_response_id = previousResponseId;
  }
  if (params.temperature !== undefined) {
    request.temperature = params.temperature;
  }
  return request;
}

/**
 * Prior turns as plain text items, then the new user message. Blank turns and
 * turns still streaming are left out.
 */
export function buildInputFromHistory(
  history: ChatMessage[],
  text: string,
  attachments: MessageAttachment[] = [],
): InputMessage[] {
  const input: InputMessage[] = [];
  for (const message of history) {
    if (!message.text.trim() || message.isStreaming) {
      continue;
    }
    input.push({
      type: "message",
      role: message.role,
      content: message.text,
    });
  }
  input.push(buildUserInputMessage(text, attachments));
  return input;
}

export function buildUserInputMessage(text: string, attachments: MessageAttachment[] = []): InputMessage {
  if (attachments.length === 0) {
    return {
      type: "message",
      role: "user",
      content: text,
    };
  }

  const parts: InputContentPart[] = [];
  if (text.trim()) {
    parts.push({ type: "input_text", text });
  }
  for (const attachment of attachments) {
    parts.push(toInputPart(attachment));
  }
  return {
    type: "message",
    role: "user",
    content: parts,
  };
}

function toInputPart(attachment: MessageAttachment): InputContentPart {
  const dataUrl = `data:${attachment.mimeType};base64,${Buffer.from(attachment.data).toString("base64")}`;
  if (isImageAttachment(attachment)) {
    return {
      type: "input_image",
      image_url: dataUrl,
      detail: "auto",
    };
  }
  return {
    type: "input_file",
    filename: attachment.filename,
    file_data: dataUrl,
  };
}
