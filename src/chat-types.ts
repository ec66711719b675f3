export type MessageRole = "user" | "assistant" | "system";

export type MessageAttachment = {
  id: string;
  filename: string;
  mimeType: string;
  data: Uint8Array;
  thumbnailData?: Uint8Array;
};

export type ChatMessage = {
  role: MessageRole;
  text: string;
  attachments?: MessageAttachment[];
  isStreaming?: boolean;
};

export function isImageAttachment(attachment: MessageAttachment): boolean {
  return attachment.mimeType.toLowerCase().startsWith("image/");
}
