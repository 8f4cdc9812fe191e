import axios, { type AxiosInstance, type AxiosAdapter, isAxiosError } from "axios";
import type { ModelLevel } from "./model";
import type { EllieModelPayload } from "./ellieFormat";
import { EllieApiError } from "./errors";
import { silentLogger, type Logger } from "./logger";

export interface EllieSettings {
	/** Organization URL, e.g. `https://acme.ellie.ai` */
	readonly organization: string;
	readonly token: string;
	readonly apiVersion?: string;
}

/**
 * The Ellie operations the transfer needs. {@link EllieClient} talks HTTP;
 * tests substitute an in-memory implementation.
 */
export interface EllieApi {
	/** Create a model, returning its id when the response carries one. */
	createModel(payload: EllieModelPayload): Promise<string | undefined>;
	exportModel(modelId: string): Promise<unknown>;
	updateModel(modelId: string, payload: EllieModelPayload): Promise<void>;
}

export interface EllieClientOptions {
	readonly logger?: Logger;
	readonly timeoutMs?: number;
	/** Replaces axios' HTTP transport */
	readonly adapter?: AxiosAdapter;
}

export class EllieClient implements EllieApi {
	private readonly _http: AxiosInstance;
	private readonly _logger: Logger;

	constructor(private readonly _settings: EllieSettings, options: EllieClientOptions = {}) {
		this._logger = options.logger ?? silentLogger;
		this._http = axios.create({
			baseURL: `${normalizeOrganization(_settings.organization)}/api/${_settings.apiVersion ?? "v1"}`,
			headers: { "Content-Type": "application/json" },
			params: { token: _settings.token },
			timeout: options.timeoutMs ?? 60_000,
			...(options.adapter ? { adapter: options.adapter } : {}),
		});
	}

	async createModel(payload: EllieModelPayload): Promise<string | undefined> {
		this._logger.info(
			{ model: payload.model.name, level: payload.model.level, entities: payload.model.entities.length },
			"creating model"
		);
		const data = await this._request("POST", "/models", payload);
		return extractModelId(data);
	}

	async exportModel(modelId: string): Promise<unknown> {
		this._logger.debug({ modelId }, "exporting model");
		return this._request("GET", `/models/${encodeURIComponent(modelId)}`);
	}

	async updateModel(modelId: string, payload: EllieModelPayload): Promise<void> {
		this._logger.info({ modelId, entities: payload.model.entities.length }, "updating model");
		await this._request("PUT", `/models/${encodeURIComponent(modelId)}`, payload);
	}

	/**
	 * Browser link to a model, or to a search by name when the id is unknown.
	 */
	modelUrl(level: ModelLevel, modelId: string | undefined, modelName: string): string {
		const organization = normalizeOrganization(this._settings.organization);
		if (modelId === undefined) {
			return `${organization}/models?search=${encodeURIComponent(modelName)}`;
		}
		return `${organization}/models/${level}/${encodeURIComponent(modelId)}`;
	}

	private async _request(method: "GET" | "POST" | "PUT", url: string, data?: unknown): Promise<unknown> {
		try {
			const response = await this._http.request<unknown>({ method, url, data });
			return response.data;
		} catch (error) {
			if (isAxiosError(error)) {
				const status = error.response?.status;
				const body = stringifyBody(error.response?.data);
				throw new EllieApiError(
					status === undefined
						? `Ellie request ${method} ${url} failed: ${error.message}`
						: `Ellie request ${method} ${url} failed with status ${status}`,
					status,
					body
				);
			}
			throw error;
		}
	}
}

/**
 * Ellie answers model creation with `id` or `modelId`.
 */
export function extractModelId(data: unknown): string | undefined {
	if (typeof data !== "object" || data === null) return undefined;
	for (const key of ["id", "modelId"]) {
		const value: unknown = Reflect.get(data, key);
		if (typeof value === "string" || typeof value === "number") {
			return String(value);
		}
	}
	return undefined;
}

/**
 * Prefix `https://` when no scheme is given and drop trailing slashes.
 */
export function normalizeOrganization(organization: string): string {
	const trimmed = organization.trim().replace(/\/+$/, "");
	return /^https?:\/\//.test(trimmed) ? trimmed : `https://${trimmed}`;
}

function stringifyBody(data: unknown): string {
	if (data === undefined) return "";
	return typeof data === "string" ? data : JSON.stringify(data);
}
