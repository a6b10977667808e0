import {
  BalanceSchema,
  BarcodeInfoSchema,
  ChatMessagesPayloadSchema,
  ChatRoomResultSchema,
  ChatRoomsPayloadSchema,
  CreateLinkResultSchema,
  HistoryPayloadSchema,
  isSuccessResult,
  LinkInfoSchema,
  P2PCodeResultSchema,
  ProfileSchema,
  SendMoneyResultSchema,
  SUCCESS_RESULT_CODE,
  UserSearchPayloadSchema,
  type AuthState,
  type BalanceInfo,
  type BarcodeInfo,
  type ChatRoomResult,
  type CreateLinkResult,
  type DeviceIdentity,
  type HistoryItem,
  type LinkInfo,
  type MoneyPriority,
  type P2PCodeResult,
  type Profile,
  type SendMoneyResult,
  type TokenPair,
  type UserSearchResult
} from "@paybridge/types";
import type { z } from "zod";
import { AuthStateMachine, type AuthorizationArtifact, type OnStateChange } from "./auth.js";
import { ChallengeSolver } from "./challenge/solver.js";
import { DelegatedCaptchaStrategy, ProofOfWorkStrategy } from "./challenge/strategies.js";
import type { CaptchaSolver } from "./challenge/types.js";
import { resolveConfig } from "./config.js";
import { ApiRequestError, ValidationError } from "./errors.js";
import { DeviceIdentityProvider } from "./identity.js";
import { createLogger, type Logger } from "./logger.js";
import { Session } from "./session.js";
import { RequestSigner } from "./signer.js";
import { TokenStore, type OnTokenChange } from "./token-store.js";
import { createFetcher, type Fetcher } from "./transport/fetcher.js";
import { TransportPipeline, type ApiResult, type CallOptions, type Endpoint } from "./transport/pipeline.js";
import { isPhoneCredentials, type Config, type Credentials, type ProxyConfig } from "./types.js";
import { extractLinkId, normalizePhoneNumber, stripChatRoomPrefix } from "./utils/normalize.js";

export interface ClientExtras {
  proxy?: ProxyConfig;
  /** A device UUID already registered with the backend; generated when omitted. */
  deviceId?: string;
  captchaSolver?: CaptchaSolver;
  /** Replaces the undici fetcher (and with it the proxy setting). */
  fetcher?: Fetcher;
  config?: Partial<Config>;
  logger?: Logger;
  onTokenChange?: OnTokenChange;
  onStateChange?: OnStateChange;
}

export type PayClientOptions = Credentials & ClientExtras;

function requirePositiveAmount(amount: number): void {
  if (!Number.isInteger(amount) || amount <= 0) {
    throw new ValidationError(`amount must be a positive integer, got ${amount}`);
  }
}

export class PayClient {
  readonly config: Config;
  private readonly logger: Logger;
  private readonly session: Session;
  private readonly pipeline: TransportPipeline;
  private readonly auth: AuthStateMachine;

  constructor(options: PayClientOptions) {
    this.config = resolveConfig(options.config);
    this.logger = options.logger ?? createLogger(this.config.logLevel);

    const fetcher = options.fetcher ?? createFetcher(options.proxy);
    const tokens = new TokenStore(options.onTokenChange);
    const challenges = new ChallengeSolver({
      strategies: [
        new ProofOfWorkStrategy({
          maxIterations: this.config.maxSolveIterations,
          chunkSize: this.config.solveChunkSize,
          fetcher,
          logger: this.logger
        }),
        new DelegatedCaptchaStrategy(options.captchaSolver)
      ],
      ttlMs: this.config.challengeTtlMs,
      logger: this.logger.child({ component: "challenge" })
    });

    this.session = new Session(new DeviceIdentityProvider(options.deviceId), tokens, challenges);
    this.pipeline = new TransportPipeline(this.session, {
      config: this.config,
      signer: new RequestSigner(this.config.signingKey),
      fetcher,
      logger: this.logger
    });

    if (!isPhoneCredentials(options)) {
      if (options.accessToken.trim() === "") {
        throw new ValidationError("accessToken must be a non-empty string");
      }
      tokens.set({
        accessToken: options.accessToken,
        refreshToken: options.refreshToken,
        expiresAt: Date.now() + this.config.accessTokenTtlSeconds * 1000
      });
    }

    this.auth = new AuthStateMachine(this.session, this.pipeline, {
      credentials: isPhoneCredentials(options)
        ? { phoneNumber: normalizePhoneNumber(options.phoneNumber), password: options.password }
        : undefined,
      accessTokenTtlSeconds: this.config.accessTokenTtlSeconds,
      logger: this.logger,
      onStateChange: options.onStateChange
    });
  }

  get state(): AuthState {
    return this.auth.current;
  }

  get accessToken(): string | undefined {
    return this.session.tokens.peek()?.accessToken;
  }

  get refreshToken(): string | undefined {
    return this.session.tokens.peek()?.refreshToken;
  }

  get identity(): Readonly<DeviceIdentity> {
    return this.session.identity.identity();
  }

  login(artifact: AuthorizationArtifact): Promise<TokenPair> {
    return this.auth.login(artifact);
  }

  refresh(): Promise<TokenPair> {
    return this.auth.refresh();
  }

  logout(): void {
    this.auth.logout();
  }

  call(endpoint: Endpoint, payload?: unknown, options?: CallOptions): Promise<ApiResult> {
    return this.pipeline.call(endpoint, payload, options);
  }

  async getProfile(): Promise<Profile> {
    return this.read({ method: "GET", path: "/bff/v2/getProfile" }, ProfileSchema);
  }

  async getBalance(): Promise<BalanceInfo> {
    return this.read({ method: "GET", path: "/bff/v2/getBalance" }, BalanceSchema);
  }

  async getHistory(size = 20): Promise<HistoryItem[]> {
    const payload = await this.read({ method: "GET", path: "/bff/v2/getHistory" }, HistoryPayloadSchema, undefined, {
      size: String(size)
    });
    return payload.history;
  }

  async getPointHistory(): Promise<HistoryItem[]> {
    const payload = await this.read({ method: "GET", path: "/bff/v2/getPointHistory" }, HistoryPayloadSchema);
    return payload.history;
  }

  async getChatRooms(size = 20): Promise<Array<Record<string, unknown>>> {
    const payload = await this.read({ method: "GET", path: "/bff/v2/getChatRooms" }, ChatRoomsPayloadSchema, undefined, {
      size: String(size)
    });
    return payload.chatRooms;
  }

  async getChatRoomMessages(chatRoomId: string): Promise<Array<Record<string, unknown>>> {
    const id = encodeURIComponent(stripChatRoomPrefix(chatRoomId));
    const payload = await this.read({ method: "GET", path: `/bff/v2/getChatRoomMessages/${id}` }, ChatMessagesPayloadSchema);
    return payload.messages;
  }

  async linkCheck(urlOrId: string, options: { web?: boolean } = {}): Promise<LinkInfo> {
    const linkId = encodeURIComponent(extractLinkId(urlOrId));
    const endpoint: Endpoint = options.web
      ? { method: "GET", path: `/portal/api/v2/link/check/${linkId}`, baseUrl: this.config.webBaseUrl }
      : { method: "GET", path: `/bff/v2/executeLink/check/${linkId}` };
    return this.read(endpoint, LinkInfoSchema);
  }

  async linkReceive(urlOrId: string, options: { password?: string; linkInfo?: LinkInfo } = {}): Promise<boolean> {
    const linkId = extractLinkId(urlOrId);
    const linkInfo = options.linkInfo ?? (await this.linkCheck(linkId));
    const body: Record<string, string> = { linkId, orderId: linkInfo.orderId };
    if (options.password) {
      body.password = options.password;
    }
    return this.execute({ method: "POST", path: "/bff/v2/executeLink/receive" }, body);
  }

  async linkReject(urlOrId: string, linkInfo?: LinkInfo): Promise<boolean> {
    const linkId = extractLinkId(urlOrId);
    const info = linkInfo ?? (await this.linkCheck(linkId));
    return this.execute({ method: "POST", path: "/bff/v2/executeLink/reject" }, { linkId, orderId: info.orderId });
  }

  async linkCancel(urlOrId: string, linkInfo?: LinkInfo): Promise<boolean> {
    const linkId = extractLinkId(urlOrId);
    const info = linkInfo ?? (await this.linkCheck(linkId));
    return this.execute({ method: "POST", path: "/bff/v2/executeLink/cancel" }, { linkId, orderId: info.orderId });
  }

  async createLink(amount: number, passcode?: string): Promise<CreateLinkResult> {
    requirePositiveAmount(amount);
    return this.read({ method: "POST", path: "/bff/v2/createLink" }, CreateLinkResultSchema, passcode ? { amount, passcode } : { amount });
  }

  async createP2PCode(amount?: number): Promise<P2PCodeResult> {
    if (amount !== undefined) requirePositiveAmount(amount);
    return this.read({ method: "POST", path: "/bff/v2/createP2PCode" }, P2PCodeResultSchema, amount === undefined ? {} : { amount });
  }

  async sendMoney(amount: number, receiverId: string): Promise<SendMoneyResult> {
    requirePositiveAmount(amount);
    if (!receiverId) {
      throw new ValidationError("receiverId is required");
    }
    return this.read({ method: "POST", path: "/bff/v2/sendMoney" }, SendMoneyResultSchema, { amount, receiverId });
  }

  async sendMessage(chatRoomId: string, message: string): Promise<boolean> {
    return this.execute({ method: "POST", path: "/bff/v2/sendMessage" }, { chatRoomId, message });
  }

  async setMoneyPriority(preferMoney = false): Promise<boolean> {
    const priority: MoneyPriority = preferMoney ? "MONEY" : "MONEY_LIGHT";
    return this.execute({ method: "POST", path: "/bff/v2/setMoneyPriority" }, { priority });
  }

  async searchP2PUser(userId: string, options: { isGlobal?: boolean; order?: number } = {}): Promise<UserSearchResult> {
    const { isGlobal = true, order = 0 } = options;
    const payload = await this.read({ method: "GET", path: "/bff/v2/searchP2PUser" }, UserSearchPayloadSchema, undefined, {
      userId,
      isGlobal: String(isGlobal)
    });

    const user = payload.users[order];
    if (payload.users.length === 0) {
      throw new ValidationError("User not found", { userId });
    }
    if (!user) {
      throw new ValidationError(`User index ${order} out of range`, { userId, order, matches: payload.users.length });
    }
    return user;
  }

  async initializeChatroom(externalUserId: string): Promise<ChatRoomResult> {
    return this.read({ method: "POST", path: "/bff/v2/initializeChatroom" }, ChatRoomResultSchema, { externalUserId });
  }

  async getBarcodeInfo(url: string): Promise<BarcodeInfo> {
    return this.read({ method: "POST", path: "/bff/v2/getBarcodeInfo" }, BarcodeInfoSchema, { url });
  }

  private async read<T>(
    endpoint: Endpoint,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    body?: unknown,
    query?: Record<string, string>
  ): Promise<T> {
    const result = await this.pipeline.call(endpoint, body, { query });
    if (!isSuccessResult(result)) {
      throw new ApiRequestError(result.resultMessage ?? `${endpoint.path} was declined`, {
        status: result.status,
        resultCode: result.resultCode
      });
    }

    const parsed = schema.safeParse(result.payload);
    if (!parsed.success) {
      this.logger.warn({ path: endpoint.path, issues: parsed.error.issues.length }, "unexpected response shape");
      throw new ApiRequestError(`${endpoint.path} returned an unexpected payload`, { status: result.status });
    }
    return parsed.data;
  }

  private async execute(endpoint: Endpoint, body: Record<string, string>): Promise<boolean> {
    const result = await this.pipeline.call(endpoint, body);
    return result.resultCode === SUCCESS_RESULT_CODE;
  }
}

export function createPayClient(options: PayClientOptions): PayClient {
  return new PayClient(options);
}
