/**
 * HTTP client public API
 */

export { httpRequest } from "./httpClient";
export { HttpError, isTransportError } from "./httpError";
export type {
  HttpRequest,
  HttpRequestFn,
  HttpMethod,
  HttpErrorDetails,
} from "@/types";
