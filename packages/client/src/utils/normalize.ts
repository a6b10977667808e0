import { ValidationError } from "../errors.js";

const CHAT_ROOM_PREFIX = "sendbird_group_channel_";

export function normalizePhoneNumber(phone: string): string {
  return phone.replace(/-/g, "");
}

/** Accepts a full link URL (`...?id=XXXX` or `.../link/XXXX`) or a bare id. */
export function extractLinkId(urlOrId: string): string {
  const value = urlOrId.trim();
  const byQuery = /[?&]id=([A-Za-z0-9]+)/.exec(value);
  if (byQuery?.[1]) return byQuery[1];
  if (value.includes("://")) {
    let url: URL;
    try {
      url = new URL(value);
    } catch (error) {
      throw new ValidationError(`Link URL could not be parsed: ${error instanceof Error ? error.message : String(error)}`, {
        link: value
      });
    }
    const segments = url.pathname.split("/").filter(Boolean);
    return segments.at(-1) ?? value;
  }
  return value;
}

export function stripChatRoomPrefix(chatRoomId: string): string {
  return chatRoomId.startsWith(CHAT_ROOM_PREFIX) ? chatRoomId.slice(CHAT_ROOM_PREFIX.length) : chatRoomId;
}
