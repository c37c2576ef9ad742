import chalk from "chalk";

import logger from "./logger.js";

type HttpMethod = "GET" | "POST";

function formatMethod(method: HttpMethod): string {
  return method === "GET" ? chalk.green(method) : chalk.yellow(method);
}

function getStatusColor(status: number): typeof chalk.red {
  if (status >= 500) {return chalk.red;}
  if (status >= 400) {return chalk.yellow;}
  if (status >= 300) {return chalk.cyan;}
  if (status >= 200) {return chalk.green;}
  return chalk.white;
}

function getStatusText(status: number): string {
  const statusMap: Record<number, string> = {
    200: "OK",
    400: "Bad Request",
    401: "Unauthorized",
    403: "Forbidden",
    404: "Not Found",
    429: "Too Many Requests",
    500: "Internal Server Error",
    502: "Bad Gateway",
    503: "Service Unavailable",
    504: "Gateway Timeout",
  };

  return statusMap[status] ?? "";
}

/**
 * Returns a copy of the headers that is safe to log: the bearer token is
 * always replaced.
 */
export function maskHeaders(headers: Record<string, string>): Record<string, string> {
  const masked: Record<string, string> = { ...headers };
  if (masked["Authorization"]) {
    masked["Authorization"] = "Bearer ********";
  }
  return masked;
}

export function logGatewayRequest(
  method: HttpMethod,
  url: string,
  headers: Record<string, string>,
  stream = false,
): void {
  logger.debug(
    `${chalk.blue("➤")} ${chalk.dim(new Date().toISOString())} ${formatMethod(method)} ${chalk.cyan(url)}` +
      (stream ? ` ${chalk.dim("stream:")} ${chalk.yellow("enabled")}` : ""),
  );
  logger.debug(`  ${chalk.dim("headers:")}`, JSON.stringify(maskHeaders(headers)));
}

export function logGatewayResponse(status: number, url: string, startedAt: number): void {
  const statusColor = getStatusColor(status);
  const statusText = statusColor(`${status} ${getStatusText(status)}`.trimEnd());
  const duration = Date.now() - startedAt;

  logger.debug(
    `${chalk.blue("⮑")} ${statusText} ${chalk.cyan(url)} ${chalk.dim("in")} ${chalk.magenta(`${duration}ms`)}`,
  );
}
