import type { EventEmitter } from "node:events";
import WebSocket from "ws";
import {
	KlineEvent,
	ModuleLogger,
	toErrorMessage,
	toExchangeInterval,
} from "@sigflow/core";
import { runtimeLogger } from "../logger";
import { parseBinanceKlineMessage } from "./binanceKline";
import { collapseSymbol } from "./symbols";

export const BINANCE_STREAM_ENDPOINT = "wss://stream.binance.com:9443/stream";

export interface KlineStream {
	symbol: string;
	interval: string;
}

export type KlineSocket = EventEmitter & { terminate(): void };

export interface BinanceKlineSourceOptions {
	streams: KlineStream[];
	onKline: (event: Readonly<KlineEvent>) => void | Promise<void>;
	endpoint?: string;
	reconnectDelayMs?: number;
	createSocket?: (url: string) => KlineSocket;
	logger?: ModuleLogger;
}

export const toStreamName = ({ symbol, interval }: KlineStream): string =>
	`${collapseSymbol(symbol).toLowerCase()}@kline_${toExchangeInterval(interval)}`;

/**
 * Live kline updates, open and closed, from one combined Binance stream.
 * Reconnects after the socket closes until stopped.
 */
export class BinanceKlineSource {
	readonly venue = "binance";
	readonly url: string;

	private ws: KlineSocket | null = null;
	private running = false;
	private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
	private readonly reconnectDelayMs: number;
	private readonly createSocket: (url: string) => KlineSocket;
	private readonly logger: ModuleLogger;

	constructor(private readonly options: BinanceKlineSourceOptions) {
		const streams = options.streams.map(toStreamName);
		this.url = `${options.endpoint ?? BINANCE_STREAM_ENDPOINT}?streams=${streams.join("/")}`;
		this.reconnectDelayMs = options.reconnectDelayMs ?? 1_000;
		this.createSocket = options.createSocket ?? ((url) => new WebSocket(url));
		this.logger = options.logger ?? runtimeLogger;
	}

	start(): void {
		if (this.running) {
			throw new Error("BinanceKlineSource already running");
		}
		this.running = true;
		this.connect();
	}

	stop(): void {
		if (!this.running) {
			return;
		}
		this.running = false;
		this.cleanupWs();
		if (this.reconnectTimer) {
			clearTimeout(this.reconnectTimer);
			this.reconnectTimer = null;
		}
	}

	private connect(): void {
		if (!this.running) {
			return;
		}

		const ws = this.createSocket(this.url);
		this.ws = ws;

		ws.on("open", () => {
			this.logger.info("binance_source_connected", {
				venue: this.venue,
				streams: this.options.streams.length,
			});
		});

		ws.on("message", (payload: WebSocket.RawData) => {
			void this.handleMessage(payload.toString());
		});

		ws.on("close", () => {
			this.logger.warn("binance_source_disconnected", { venue: this.venue });
			this.scheduleReconnect();
		});

		ws.on("error", (error: Error) => {
			this.logger.error("binance_source_error", {
				venue: this.venue,
				message: error.message,
			});
		});
	}

	private scheduleReconnect(): void {
		if (!this.running || this.reconnectTimer) {
			return;
		}

		this.reconnectTimer = setTimeout(() => {
			this.reconnectTimer = null;
			this.cleanupWs();
			this.connect();
		}, this.reconnectDelayMs);
	}

	private cleanupWs(): void {
		if (!this.ws) {
			return;
		}
		const ws = this.ws;
		this.ws = null;
		ws.removeAllListeners();
		// terminating a socket that is still connecting emits "error"
		ws.on("error", () => undefined);
		try {
			ws.terminate();
		} catch (error) {
			this.logger.debug("binance_source_terminate_failed", {
				message: toErrorMessage(error),
			});
		}
	}

	private async handleMessage(raw: string): Promise<void> {
		if (!this.running) {
			return;
		}

		try {
			const event = parseBinanceKlineMessage(raw);
			if (event) {
				await this.options.onKline(event);
			}
		} catch (error) {
			this.logger.error("binance_source_message_failed", {
				venue: this.venue,
				message: toErrorMessage(error),
			});
		}
	}
}
