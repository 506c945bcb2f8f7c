import type { ApiResponse } from "../types/api";
import { getApiBaseUrl } from "./config";

export class ApiError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = "ApiError";
    this.status = status;
  }
}

export type QueryParams = Record<string, string | number | undefined>;

export const buildUrl = (path: string, query?: QueryParams) => {
  const base = path.startsWith("http")
    ? path
    : `${getApiBaseUrl()}${path.startsWith("/") ? "" : "/"}${path}`;

  const search = Object.entries(query ?? {})
    .filter((entry): entry is [string, string | number] => entry[1] !== undefined)
    .map(([key, value]) => `${encodeURIComponent(key)}=${encodeURIComponent(String(value))}`)
    .join("&");

  return search ? `${base}${base.includes("?") ? "&" : "?"}${search}` : base;
};

const buildHeaders = (token?: string, headers?: HeadersInit) => {
  const result = new Headers(headers);

  if (token) {
    result.set("Authorization", `Bearer ${token}`);
  }
  if (!result.has("Content-Type")) {
    result.set("Content-Type", "application/json");
  }

  return result;
};

async function parseApiResponse<T>(response: Response): Promise<T> {
  let json: ApiResponse<T>;
  try {
    json = (await response.json()) as ApiResponse<T>;
  } catch {
    throw new ApiError(response.ok ? "Invalid response payload" : "Request failed", response.status);
  }

  if (!response.ok || !json.success) {
    throw new ApiError(json.error || "Request failed", response.status);
  }

  if (!("data" in json)) {
    throw new ApiError("No data returned from API", response.status);
  }

  return json.data;
}

export async function apiRequest<T>(
  path: string,
  options: RequestInit & { token?: string; query?: QueryParams } = {}
): Promise<T> {
  const { token, query, headers, ...rest } = options;
  const response = await fetch(buildUrl(path, query), {
    ...rest,
    headers: buildHeaders(token, headers),
  });

  return parseApiResponse<T>(response);
}
