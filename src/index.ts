// Support Session Orchestrator - Entry point
// Wires collaborators from the environment and starts the gateway.

import "dotenv/config";
import OpenAI from "openai";
import { createAppServer } from "./server.js";
import { SessionManager } from "./session-manager.js";
import { loadConfig } from "./config.js";
import type { OpenAIClient } from "./openai-client.js";
import { OpenAIRiskClassifier } from "./risk-classifier.js";
import { OpenAIResponder, TemplateResponder } from "./responder.js";
import { FileLedgerStore, InMemoryLedgerStore } from "./ledger-store.js";
import { HttpWarmTransferClient, UnconfiguredWarmTransfer } from "./warm-transfer.js";
import { createLoggingSink } from "./observability.js";
import { TokenVault } from "./redaction-gate.js";
import { createConsoleLogger } from "./logger.js";
import { describeError } from "./errors.js";

export const APP_NAME = "Support Session Orchestrator";
export const APP_VERSION = "0.1.0";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

/** Adapts the `openai` SDK client to the JSON-mode surface the adapters use. */
export function wrapOpenAI(sdk: OpenAI): OpenAIClient {
  return {
    chat: {
      completions: {
        create: (params) => sdk.chat.completions.create(params),
      },
    },
  };
}

async function main(): Promise<void> {
  const port = parseInt(process.env.PORT || "3000", 10);
  const config = loadConfig();
  logInit("Configuration loaded");

  // ─── Collaborators ────────────────────────────────────────────────────────────

  const openaiKey = process.env.OPENAI_API_KEY;
  const openaiClient = openaiKey ? wrapOpenAI(new OpenAI({ apiKey: openaiKey })) : null;
  if (openaiClient) {
    logInit(`OpenAI enabled (classifier ${config.classifierModel}, responder ${config.generationModel})`);
  } else {
    logInit("OPENAI_API_KEY not set: keyword-only risk assessment and template replies");
  }

  const ledgerDir = process.env.LEDGER_DIR;
  const store = ledgerDir ? new FileLedgerStore(ledgerDir) : new InMemoryLedgerStore();
  logInit(ledgerDir ? `Ledger persisted under ${ledgerDir}/` : "Ledger held in memory");

  const transferUrl = process.env.WARM_TRANSFER_URL;
  const transfer = transferUrl
    ? new HttpWarmTransferClient({ endpoint: transferUrl, apiKey: process.env.WARM_TRANSFER_API_KEY })
    : new UnconfiguredWarmTransfer();
  logInit(transferUrl ? `Warm transfer endpoint: ${transferUrl}` : "No warm transfer endpoint configured");

  // ─── Session manager ──────────────────────────────────────────────────────────

  const sessionManager = new SessionManager({
    config,
    store,
    classifier: openaiClient ? new OpenAIRiskClassifier(openaiClient, config.classifierModel) : null,
    responder: openaiClient ? new OpenAIResponder(openaiClient, config.generationModel) : new TemplateResponder(),
    transfer,
    observabilitySink: createLoggingSink(createConsoleLogger("Observability")),
    vault: process.env.ENABLE_TOKEN_VAULT === "true" ? new TokenVault() : null,
  });
  sessionManager.start();

  // ─── Start server ─────────────────────────────────────────────────────────────

  const server = createAppServer({ sessionManager });
  const bound = await server.listen(port);
  logInit(`${APP_NAME} v${APP_VERSION} running at http://localhost:${bound}`);

  const shutdown = (signal: string): void => {
    logInit(`${signal} received, shutting down`);
    sessionManager
      .shutdown()
      .then(() => server.close())
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logFatal(`Shutdown failed: ${describeError(err)}`);
        process.exit(1);
      });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  logFatal(describeError(err));
  process.exit(1);
});
