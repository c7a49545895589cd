export { HttpRequest, parseRequest } from "./request.ts";
export type { HttpRequestInit, QueryValue } from "./request.ts";
