/**
 * Local redirect listener for the token-in-fragment flow.
 *
 * GET /callback        serves the bridge page that lifts the token out of the
 *                      URL fragment
 * GET /token-received  receives token + state from the bridge page, checks the
 *                      state against the session and fires the completion signal
 */

import Fastify from "fastify";
import { z } from "zod";
import { CALLBACK_PATH, TOKEN_RECEIVED_PATH } from "../../constants";
import { createExportError, errorMessage } from "../../errors";
import type { Logger } from "../../logger";
import type { AuthSession } from "../session";
import type { CompletionOutcome } from "../types";
import { BRIDGE_PAGE_HTML, COMPLETION_MESSAGES } from "./bridgePage";

// Repeated parameters arrive as arrays and fail this schema
const TokenReceivedQuerySchema = z.object({
  token: z.string().optional(),
  state: z.string().optional(),
});

function createListenerApp(logger: Logger) {
  return Fastify({ loggerInstance: logger });
}

export type ListenerApp = ReturnType<typeof createListenerApp>;

export interface RedirectListener {
  app: ListenerApp;
  /** Resolves with the access token once a delivery with a matching state arrives. */
  waitForToken: () => Promise<string>;
  /** Bind the listener; resolves with the listening address. */
  listen: (port: number, host: string) => Promise<string>;
  /** Stop the listener. Safe to call more than once; only the first call closes. */
  close: () => Promise<void>;
}

export function createRedirectListener(session: AuthSession, logger: Logger): RedirectListener {
  const app = createListenerApp(logger);

  let resolveToken: (token: string) => void;
  const tokenPromise = new Promise<string>((resolve) => {
    resolveToken = resolve;
  });

  app.get(CALLBACK_PATH, async (_request, reply) => {
    reply.type("text/html; charset=utf-8");
    return BRIDGE_PAGE_HTML;
  });

  app.get(TOKEN_RECEIVED_PATH, async (request, reply) => {
    const query = TokenReceivedQuerySchema.safeParse(request.query);
    const outcome: CompletionOutcome = query.success
      ? session.receive(query.data.token, query.data.state)
      : { type: "missing_token" };

    switch (outcome.type) {
      case "authorized":
        request.log.info("Access token received, state matches");
        break;
      case "missing_token":
        request.log.warn("Token delivery without a token");
        break;
      case "state_mismatch":
        request.log.warn("State mismatch: the redirect did not originate from this session");
        break;
      case "already_completed":
        request.log.info("Ignoring token delivery after authorization completed");
        break;
    }

    reply.type("text/plain; charset=utf-8");
    if (outcome.type === "authorized" && session.token !== null) {
      resolveToken(session.token);
    }
    return COMPLETION_MESSAGES[outcome.type];
  });

  let closing: Promise<void> | null = null;

  return {
    app,
    waitForToken: () => tokenPromise,
    listen: async (port, host) => {
      try {
        return await app.listen({ port, host });
      } catch (error) {
        throw createExportError(
          `Redirect listener failed to start on ${host}:${port}: ${errorMessage(error)}`,
          "LISTENER",
          error
        );
      }
    },
    close: () => {
      if (!closing) {
        closing = app.close().then(() => {
          logger.debug("Redirect listener stopped");
        });
      }
      return closing;
    },
  };
}
