import { z } from "zod";

export const ProfileSchema = z.object({
  name: z.string().default(""),
  externalUserId: z.string().default(""),
  icon: z.string().optional()
});

export type Profile = z.infer<typeof ProfileSchema>;

// `balance` is what the gateway returns for the lightweight balance route;
// the full route reports `allBalance` with a breakdown.
export const BalanceSchema = z
  .object({
    balance: z.number().optional(),
    allBalance: z.number().optional(),
    useableBalance: z.number().default(0),
    moneyLight: z.number().default(0),
    money: z.number().default(0),
    points: z.number().default(0)
  })
  .transform(({ balance, allBalance, ...rest }) => ({
    balance: allBalance ?? balance ?? 0,
    ...rest
  }));

export type BalanceInfo = z.infer<typeof BalanceSchema>;

export const HistoryItemSchema = z.object({
  orderId: z.string().default(""),
  amount: z.number().default(0),
  transactionType: z.string().default(""),
  datetime: z.string().default(""),
  description: z.string().optional()
});

export type HistoryItem = z.infer<typeof HistoryItemSchema>;

export const HistoryPayloadSchema = z.object({
  history: z.array(HistoryItemSchema).default([])
});

export const LinkInfoSchema = z.object({
  amount: z.number().default(0),
  moneyLight: z.number().default(0),
  money: z.number().default(0),
  hasPassword: z.boolean().default(false),
  chatRoomId: z.string().optional(),
  status: z.string().default(""),
  orderId: z.string().default(""),
  linkId: z.string().optional()
});

export type LinkInfo = z.infer<typeof LinkInfoSchema>;

export const CreateLinkResultSchema = z.object({
  link: z.string().default(""),
  chatRoomId: z.string().default(""),
  orderId: z.string().optional()
});

export type CreateLinkResult = z.infer<typeof CreateLinkResultSchema>;

export const P2PCodeResultSchema = z.object({
  p2pcode: z.string().default("")
});

export type P2PCodeResult = z.infer<typeof P2PCodeResultSchema>;

export const SendMoneyResultSchema = z.object({
  chatRoomId: z.string().default(""),
  orderId: z.string().optional()
});

export type SendMoneyResult = z.infer<typeof SendMoneyResultSchema>;

export const UserSearchResultSchema = z.object({
  name: z.string().default(""),
  icon: z.string().optional(),
  externalUserId: z.string().default("")
});

export type UserSearchResult = z.infer<typeof UserSearchResultSchema>;

export const UserSearchPayloadSchema = z.object({
  users: z.array(UserSearchResultSchema).default([])
});

export const ChatRoomResultSchema = z.object({
  chatroomId: z.string().default("")
});

export type ChatRoomResult = z.infer<typeof ChatRoomResultSchema>;

export const ChatRoomsPayloadSchema = z.object({
  chatRooms: z.array(z.record(z.unknown())).default([])
});

export const ChatMessagesPayloadSchema = z.object({
  messages: z.array(z.record(z.unknown())).default([])
});

export const BarcodeInfoSchema = z.object({
  amount: z.number().optional(),
  externalUserId: z.string().default("")
});

export type BarcodeInfo = z.infer<typeof BarcodeInfoSchema>;

export type MoneyPriority = "MONEY" | "MONEY_LIGHT";
