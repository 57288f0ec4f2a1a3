import type { FastifyBaseLogger } from "fastify";

/** The slice of the app's pino logger that services use. */
export type Logger = Pick<FastifyBaseLogger, "debug" | "info" | "warn" | "error">;
