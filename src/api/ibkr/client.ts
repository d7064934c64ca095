/**
 * Interactive Brokers TWS API Client
 *
 * Wraps @stoqey/ib as the two upstream collaborators of a reconciliation
 * pass: the position source (account update subscription) and the live
 * Greeks feed (reqMktData with generic tick 106).
 *
 * Connection modes:
 *   - Port 7496 / 4001: Live trading (TWS / Gateway)
 *   - Port 7497 / 4002: Paper trading (TWS / Gateway)
 */

import { EventEmitter } from "eventemitter3";
import type { Contract, IBApi, TickType } from "@stoqey/ib";
import { componentLogger } from "../../utils/logger.js";
import { optionKey } from "../../utils/validation.js";
import { config, type MarketDataTypeName } from "../../config/index.js";
import { toPosition } from "./contracts.js";
import type { OptionIdentity } from "../../types/options.js";
import type { GreeksFeed, GreeksSubscriber } from "../../types/market.js";
import type { Position, PositionSource } from "../../types/portfolio.js";

const log = componentLogger("ibkr");

/** The enums read after connect() */
type IBModule = Pick<typeof import("@stoqey/ib"), "EventName" | "SecType" | "OptionType">;

/** IBKR connection states */
type ConnectionState = "disconnected" | "connecting" | "connected" | "error";

/** Events emitted by the IBKR client */
interface IBKREvents {
  connected: () => void;
  disconnected: (reason: string) => void;
  error: (error: Error) => void;
}

export interface IBKRClientOptions {
  host: string;
  port: number;
  clientId: number;
  /** Account for position downloads; empty = the connection's default */
  account?: string;
  connectTimeoutMs: number;
  positionsTimeoutMs: number;
  marketDataType: MarketDataTypeName;
}

/** Market data farm / delayed-data notices that are not request failures */
const INFORMATIONAL_CODES = new Set([2104, 2106, 2108, 2119, 2158, 10167, 10090]);

/** tickOptionComputation fields carrying model Greeks (13 live, 83 delayed) */
const MODEL_OPTION_TICKS = new Set([13, 83]);

const MARKET_DATA_TYPES: Record<MarketDataTypeName, number> = {
  realtime: 1,
  frozen: 2,
  delayed: 3,
  delayed_frozen: 4,
};

/** Generic tick list 106 = option implied volatility + model Greeks */
const GREEKS_TICK_LIST = "106";

interface GreeksRequest {
  key: string;
  subscriber: GreeksSubscriber;
}

export class IBKRClient
  extends EventEmitter<IBKREvents>
  implements GreeksFeed, PositionSource
{
  private state: ConnectionState = "disconnected";
  private ib: IBApi | null = null;
  private api: IBModule | null = null;
  private nextReqId: number = 1;
  private readonly options: IBKRClientOptions;

  // Live Greeks subscriptions, both directions
  private greeksRequests: Map<number, GreeksRequest> = new Map();
  private greeksReqIds: Map<string, number> = new Map();

  // Contract ids of option positions seen, by option key
  private conIds: Map<string, number> = new Map();

  constructor(options: Partial<IBKRClientOptions> = {}) {
    super();
    this.options = {
      host: config.ibkr.host,
      port: config.ibkr.port,
      clientId: config.ibkr.clientId,
      account: config.ibkr.account,
      connectTimeoutMs: config.ibkr.connectTimeoutMs,
      positionsTimeoutMs: config.positions.timeoutMs,
      marketDataType: config.ibkr.marketDataType,
      ...options,
    };
  }

  /** Current connection state */
  get connectionState(): ConnectionState {
    return this.state;
  }

  get isConnected(): boolean {
    return this.state === "connected";
  }

  /**
   * Connect to TWS/IB Gateway and select the market data type.
   */
  async connect(): Promise<void> {
    if (this.state === "connected") {
      log.warn("Already connected to IBKR");
      return;
    }

    const { host, port, clientId, connectTimeoutMs } = this.options;
    this.state = "connecting";
    log.info(`Connecting to IBKR at ${host}:${port} (clientId: ${clientId})`);

    try {
      const api = await import("@stoqey/ib");
      const { IBApi, EventName } = api;

      const ib = new IBApi({ host, port, clientId });
      this.ib = ib;
      this.api = api;
      this.registerHandlers(ib, api);

      // Wait for connection confirmation
      const ready = new Promise<void>((resolve, reject) => {
        const timeout = setTimeout(() => {
          reject(new Error(`IBKR connection timeout (${connectTimeoutMs}ms)`));
        }, connectTimeoutMs);

        ib.once(EventName.connected, () => {
          clearTimeout(timeout);
          resolve();
        });
      });

      ib.connect();
      await ready;
      this.state = "connected";

      ib.reqMarketDataType(MARKET_DATA_TYPES[this.options.marketDataType]);
      log.info(`Market data type: ${this.options.marketDataType}`);
    } catch (err) {
      this.state = "error";
      log.error("Failed to connect to IBKR", { error: String(err) });
      throw err;
    }
  }

  /**
   * Disconnect from TWS. Open Greeks subscriptions are cancelled first.
   */
  async disconnect(): Promise<void> {
    if (this.ib) {
      if (this.state === "connected") {
        for (const reqId of this.greeksRequests.keys()) {
          this.ib.cancelMktData(reqId);
        }
      }
      // Also closes a socket left open by a failed or timed-out connect
      this.ib.disconnect();
      this.ib = null;
    }

    this.greeksRequests.clear();
    this.greeksReqIds.clear();
    this.state = "disconnected";
    log.info("Disconnected from IBKR");
  }

  // ─── Positions ────────────────────────────────────────────

  /**
   * Download all positions with market value and P&L.
   * reqPositions only carries quantity + average cost, so this uses the
   * account update subscription (updatePortfolio) until accountDownloadEnd.
   * On timeout, whatever arrived so far is returned.
   */
  async getPositions(): Promise<Position[]> {
    this.ensureConnected();
    const ib = this.requireIb();
    const { EventName } = this.requireApi();
    const account = this.options.account ?? "";
    const collected = new Map<string, Position>();

    log.info(`Requesting positions${account ? ` for ${account}` : ""}...`);

    return new Promise((resolve) => {
      let done = false;

      const onPortfolio = (
        contract: Contract, pos: number | undefined, marketPrice: number | undefined,
        marketValue: number | undefined, averageCost: number | undefined,
        unrealizedPnL: number | undefined, realizedPnL: number | undefined,
        accountName: string | undefined
      ) => {
        if (!pos) return;
        const position = toPosition(contract, {
          quantity: pos,
          marketPrice: marketPrice ?? 0,
          marketValue: marketValue ?? 0,
          averageCost: averageCost ?? 0,
          unrealizedPnL: unrealizedPnL ?? 0,
          realizedPnL: realizedPnL ?? 0,
          account: accountName,
        });
        if (!position) {
          log.warn(`Skipping unreadable contract ${contract.localSymbol ?? contract.symbol ?? "?"}`);
          return;
        }
        const key = contract.conId !== undefined
          ? String(contract.conId)
          : `${position.secType}:${position.localSymbol ?? position.symbol}`;
        collected.set(key, position);
        if (position.secType === "OPT" && position.conId !== undefined) {
          this.conIds.set(optionKey(position.identity), position.conId);
        }
      };

      const finish = (reason: string) => {
        if (done) return;
        done = true;
        clearTimeout(timer);
        ib.removeListener(EventName.updatePortfolio, onPortfolio);
        ib.removeListener(EventName.accountDownloadEnd, onDownloadEnd);
        ib.reqAccountUpdates(false, account);
        log.info(`Received ${collected.size} positions (${reason})`);
        resolve(Array.from(collected.values()));
      };

      const onDownloadEnd = () => finish("download complete");

      const timer = setTimeout(() => finish("timeout"), this.options.positionsTimeoutMs);

      ib.on(EventName.updatePortfolio, onPortfolio);
      ib.on(EventName.accountDownloadEnd, onDownloadEnd);
      ib.reqAccountUpdates(true, account);
    });
  }

  // ─── Greeks Feed ──────────────────────────────────────────

  /**
   * Subscribe to model Greeks for an option contract.
   * A second subscription for the same identity replaces the subscriber.
   */
  subscribeGreeks(identity: OptionIdentity, subscriber: GreeksSubscriber): void {
    this.ensureConnected();
    const key = optionKey(identity);

    const existing = this.greeksReqIds.get(key);
    if (existing !== undefined) {
      this.greeksRequests.set(existing, { key, subscriber });
      return;
    }

    const reqId = this.nextReqId++;
    this.greeksRequests.set(reqId, { key, subscriber });
    this.greeksReqIds.set(key, reqId);

    log.debug(`Subscribing to Greeks for ${key} [${reqId}]`);
    try {
      this.requireIb().reqMktData(
        reqId, this.toOptionContract(identity), GREEKS_TICK_LIST, false, false
      );
    } catch (err) {
      this.greeksRequests.delete(reqId);
      this.greeksReqIds.delete(key);
      throw err;
    }
  }

  unsubscribeGreeks(identity: OptionIdentity): void {
    const key = optionKey(identity);
    const reqId = this.greeksReqIds.get(key);
    if (reqId === undefined) return;

    this.greeksReqIds.delete(key);
    this.greeksRequests.delete(reqId);
    if (this.ib && this.state === "connected") {
      this.ib.cancelMktData(reqId);
    }
  }

  /** Number of open Greeks subscriptions */
  get subscriptionCount(): number {
    return this.greeksRequests.size;
  }

  // ─── Internals ────────────────────────────────────────────

  private registerHandlers(ib: IBApi, api: IBModule): void {
    const { EventName } = api;

    ib.on(EventName.connected, () => {
      this.state = "connected";
      log.info("Connected to IBKR TWS");
      this.emit("connected");
    });

    ib.on(EventName.disconnected, () => {
      this.state = "disconnected";
      log.warn("Disconnected from IBKR TWS");
      this.emit("disconnected", "connection_lost");
    });

    ib.on(EventName.error, (err: Error, code: number, reqId: number) => {
      this.handleError(err, code, reqId);
    });

    ib.on(EventName.tickOptionComputation, (
      reqId: number, field: TickType, _tickAttrib: number | undefined,
      _iv: number | undefined, delta: number | undefined,
      _optPrice: number | undefined, _pvDividend: number | undefined,
      gamma: number | undefined, vega: number | undefined,
      theta: number | undefined
    ) => {
      this.handleTickOption(reqId, field, delta, gamma, vega, theta);
    });
  }

  private handleError(err: Error, code: number, reqId: number): void {
    if (INFORMATIONAL_CODES.has(code)) {
      log.debug(`IBKR info [${code}]: ${err.message}`);
      return;
    }

    const request = this.greeksRequests.get(reqId);
    if (request) {
      log.warn(`Greeks request [${reqId}] ${request.key} rejected [${code}]: ${err.message}`);
      request.subscriber.onError(`IBKR error ${code}: ${err.message}`);
      return;
    }

    log.error(`IBKR error [${code}] reqId=${reqId}: ${err.message}`);
    this.emit("error", err);
  }

  private handleTickOption(
    reqId: number, field: number,
    delta: number | undefined, gamma: number | undefined,
    vega: number | undefined, theta: number | undefined
  ): void {
    const request = this.greeksRequests.get(reqId);
    if (!request || !MODEL_OPTION_TICKS.has(field)) return;
    if (delta === undefined || gamma === undefined || vega === undefined || theta === undefined) {
      return;
    }
    request.subscriber.onGreeks({ delta, gamma, theta, vega });
  }

  /**
   * Request contract for an option. The conId from the position download
   * pins the contract when an expiry has several trading classes.
   */
  private toOptionContract(identity: OptionIdentity): Contract {
    const { SecType, OptionType } = this.requireApi();
    const conId = this.conIds.get(optionKey(identity));
    return {
      ...(conId !== undefined ? { conId } : {}),
      symbol: identity.symbol,
      secType: SecType.OPT,
      lastTradeDateOrContractMonth: identity.expiry,
      strike: identity.strike,
      right: identity.right === "C" ? OptionType.Call : OptionType.Put,
      exchange: identity.exchange,
      currency: identity.currency,
    };
  }

  private requireIb(): IBApi {
    if (!this.ib) throw new Error("IBKR client not initialized. Call connect() first.");
    return this.ib;
  }

  private requireApi(): IBModule {
    if (!this.api) throw new Error("IBKR client not initialized. Call connect() first.");
    return this.api;
  }

  private ensureConnected(): void {
    if (this.state !== "connected") {
      throw new Error(
        `IBKR not connected (state: ${this.state}). Call connect() first.`
      );
    }
  }
}
