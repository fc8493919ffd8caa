/**
 * Helius DAS Integration
 *
 * Cursor-paginated `getTokenAccounts` over plain JSON-RPC (no SDK).
 * Zero-balance accounts are excluded server side.
 */

import axios from "axios";
import JSONbig from "json-bigint";
import { z } from "zod";
import { AccountDataProvider, PageRequest, TokenAccountPage } from "./provider";
import { MalformedResponseError, RpcError, isRateLimitCode, toError } from "./rpc-utils";

export interface HttpResponse {
  status: number;
  data: unknown;
}

export type JsonRpcTransport = (
  url: string,
  body: unknown,
  options: { timeoutMs: number; signal?: AbortSignal }
) => Promise<HttpResponse>;

// Token amounts past 2^53 stay exact as digit strings
const losslessJson = JSONbig({ storeAsString: true });

/**
 * Parse a response body without rounding large integers.
 * Text that is not JSON comes back unchanged so the envelope check rejects it.
 */
export function decodeJsonBody(text: string): unknown {
  if (text.trim() === "") {
    return null;
  }
  try {
    return losslessJson.parse(text);
  } catch {
    return text;
  }
}

/**
 * axios POST that hands every status back instead of throwing on 4xx/5xx
 */
export const axiosJsonRpcTransport: JsonRpcTransport = async (url, body, options) => {
  try {
    const response = await axios.post<string>(url, body, {
      headers: { "Content-Type": "application/json" },
      timeout: options.timeoutMs,
      signal: options.signal,
      responseType: "text",
      transformResponse: (data: unknown) => data,
      validateStatus: () => true,
    });
    const data = typeof response.data === "string" ? decodeJsonBody(response.data) : response.data;
    return { status: response.status, data };
  } catch (error) {
    if (axios.isAxiosError(error)) {
      const timedOut = error.code === "ECONNABORTED" || error.code === "ETIMEDOUT";
      throw new RpcError(`Network error: ${error.message}`, undefined, false, timedOut, error);
    }
    throw toError(error);
  }
};

const DasTokenAccountSchema = z
  .object({
    address: z.string().optional(),
    owner: z.unknown(),
    amount: z.unknown(),
  })
  .passthrough();

const DasResponseSchema = z.object({
  result: z
    .object({
      token_accounts: z.array(DasTokenAccountSchema),
      cursor: z.string().nullish(),
    })
    .optional(),
  error: z
    .object({
      code: z.number(),
      message: z.string(),
    })
    .optional(),
});

export class HeliusDasProvider implements AccountDataProvider {
  readonly name = "das";
  private transport: JsonRpcTransport;

  constructor(transport: JsonRpcTransport = axiosJsonRpcTransport) {
    this.transport = transport;
  }

  async fetchPage(request: PageRequest): Promise<TokenAccountPage> {
    const body = {
      jsonrpc: "2.0",
      id: "holder-snapshot",
      method: "getTokenAccounts",
      params: {
        mint: request.mint,
        limit: request.limit,
        options: { showZeroBalance: false },
        ...(request.cursor ? { cursor: request.cursor } : {}),
      },
    };

    const { status, data } = await this.transport(request.endpoint, body, {
      timeoutMs: request.timeoutMs,
      signal: request.signal,
    });

    if (status === 429) {
      throw new RpcError("HTTP 429 Too Many Requests", 429, true);
    }
    if (status >= 400) {
      throw new RpcError(`HTTP ${status} from getTokenAccounts`, status);
    }

    const parsed = DasResponseSchema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new MalformedResponseError(
        `Malformed getTokenAccounts response: ${issue ? `${issue.path.join(".")}: ${issue.message}` : "unknown"}`
      );
    }

    if (parsed.data.error) {
      const { code, message } = parsed.data.error;
      throw new RpcError(`RPC error ${code}: ${message}`, code, isRateLimitCode(code));
    }

    const result = parsed.data.result;
    if (!result) {
      throw new RpcError("getTokenAccounts returned no result");
    }

    const accounts = result.token_accounts.map((account) => ({
      address: account.owner,
      balance: account.amount,
    }));

    // An empty page ends the scan even if a cursor comes back
    const cursor = accounts.length > 0 && result.cursor ? result.cursor : null;

    return { accounts, cursor };
  }
}
