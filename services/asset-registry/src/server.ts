import Fastify from "fastify";
import type { FastifyReply, FastifyRequest } from "fastify";
import {
  authorizeLedgerCall,
  type ErrorResponse,
  type GetAssetEventsResponse,
  type GetAssetResponse,
  type GetCertificateResponse,
  type GetComplianceResponse,
  type GetPositionResponse,
  type GetStatisticsResponse,
  type GetTransactionResponse,
  isPrincipal,
  type ListHoldersResponse,
  type SetTransferStatusRequest,
  type SetTransferStatusResponse,
  type TokenizeAssetResponse,
  type TransferOwnershipResponse,
  type UpdateComplianceRequest,
  type UpdateComplianceResponse,
} from "@asset-ledger/shared";
import { buildHeightSourceFromEnv, type HeightSource } from "./chain.js";
import { AssetLedger, type TransferInput } from "./ledger/asset-ledger.js";
import { toAssetDetails, type TokenizeInput } from "./ledger/assets.js";
import { toComplianceView } from "./ledger/compliance.js";
import {
  ERROR_HTTP_STATUS,
  ERROR_LABEL,
  type LedgerFailure,
  type LedgerResult,
} from "./ledger/errors.js";
import { toPositionView } from "./ledger/ownership.js";
import type { CallContext } from "./ledger/types.js";
import { parseUnits } from "./ledger/validation.js";
import { buildOpenApiSpec } from "./openapi.js";
import { type LedgerStore, SqliteLedgerStore } from "./storage/ledger-store.js";

const DEFAULT_DB_PATH = "data/asset-registry.db";
const DEFAULT_SELF_PRINCIPAL = "asset-registry";

export interface BuildServerOptions {
  ledgerStore?: LedgerStore;
  dbPath?: string;
  protocolOwner?: string;
  selfPrincipal?: string;
  serviceAuthToken?: string;
  heightSource?: HeightSource;
  serviceBaseUrl?: string;
  logger?: boolean;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function parseIdParam(value: unknown): number | null {
  if (typeof value !== "string" || !/^\d{1,15}$/.test(value)) return null;
  const parsed = Number(value);
  return parsed > 0 ? parsed : null;
}

function parseTokenizeRequest(body: unknown): TokenizeInput | null {
  if (!isObject(body)) return null;
  const totalUnits = parseUnits(body.totalUnits);
  const tradeableUnits = parseUnits(body.tradeableUnits);
  if (totalUnits === null || tradeableUnits === null) return null;
  if (typeof body.metadataHash !== "string") return null;
  return { totalUnits, tradeableUnits, metadataHash: body.metadataHash };
}

function parseTransferRequest(body: unknown, assetId: number): TransferInput | null {
  if (!isObject(body)) return null;
  if (typeof body.recipient !== "string") return null;
  const units = parseUnits(body.units);
  if (units === null) return null;
  return { assetId, recipient: body.recipient, units };
}

function parseComplianceRequest(body: unknown): UpdateComplianceRequest | null {
  if (!isObject(body) || typeof body.approved !== "boolean") return null;
  return { approved: body.approved };
}

function parseTransferStatusRequest(body: unknown): SetTransferStatusRequest | null {
  if (!isObject(body) || typeof body.enabled !== "boolean") return null;
  return { enabled: body.enabled };
}

export async function buildServer(options: BuildServerOptions = {}) {
  const app = Fastify({ logger: options.logger ?? true });
  const protocolOwner = options.protocolOwner || process.env.PROTOCOL_OWNER;
  if (!isPrincipal(protocolOwner)) {
    throw new Error(
      "PROTOCOL_OWNER is required (or pass protocolOwner in buildServer options)",
    );
  }
  const selfPrincipal =
    options.selfPrincipal || process.env.LEDGER_SELF_PRINCIPAL || DEFAULT_SELF_PRINCIPAL;
  const store =
    options.ledgerStore ||
    new SqliteLedgerStore(options.dbPath || process.env.LEDGER_DB_PATH || DEFAULT_DB_PATH);
  const ownStore = !options.ledgerStore;
  const heightSource = options.heightSource || buildHeightSourceFromEnv(store.latestHeight());
  const ownHeightSource = !options.heightSource;
  const serviceAuthToken = options.serviceAuthToken ?? process.env.SERVICE_AUTH_TOKEN;
  const serviceBaseUrl =
    options.serviceBaseUrl ||
    process.env.SERVICE_BASE_URL ||
    `http://127.0.0.1:${process.env.PORT || 4110}`;
  const ledger = new AssetLedger(
    store,
    { protocolOwner, selfPrincipal },
    {
      onCommit: (event, context) => {
        app.log.info(
          {
            action: event.action,
            assetId: event.assetId,
            txId: event.txId,
            caller: context.caller,
            height: event.height,
          },
          "ledger transition accepted",
        );
      },
    },
  );

  // Transitions run one at a time: the height read and the commit of one
  // call never interleave with another.
  let queueTail: Promise<unknown> = Promise.resolve();
  function runSerialized<T>(task: () => Promise<T>): Promise<T> {
    const run = queueTail.then(task);
    queueTail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  function authorizeMutation(req: FastifyRequest, reply: FastifyReply): string | null {
    const authorization = authorizeLedgerCall(req.headers, serviceAuthToken);
    if (!authorization.ok) {
      const response: ErrorResponse = {
        error: authorization.denial,
        message: `Missing or invalid '${authorization.header}' header`,
      };
      reply.code(401).send(response);
      return null;
    }
    return authorization.caller;
  }

  async function executeTransition<T>(
    caller: string,
    action: string,
    transition: (context: CallContext) => LedgerResult<T>,
  ): Promise<LedgerResult<T>> {
    return runSerialized(async () => {
      const context: CallContext = { caller, height: await heightSource.current() };
      const result = transition(context);
      if (!result.ok) {
        app.log.warn(
          { action, caller, error: result.error, reason: result.message },
          "ledger transition rejected",
        );
      }
      return result;
    });
  }

  function sendFailure(reply: FastifyReply, result: LedgerFailure) {
    const response: ErrorResponse = {
      error: ERROR_LABEL[result.error],
      message: result.message,
    };
    return reply.code(ERROR_HTTP_STATUS[result.error]).send(response);
  }

  app.get("/health", async () => ({ ok: true, service: "asset-registry" }));
  app.get("/openapi.json", async () => buildOpenApiSpec(serviceBaseUrl));
  app.get("/chain/status", async () => heightSource.status());

  app.post("/assets", async (req, reply) => {
    const caller = authorizeMutation(req, reply);
    if (!caller) return;

    const parsed = parseTokenizeRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected integer totalUnits, tradeableUnits and a metadataHash string",
      });
    }

    const result = await executeTransition(caller, "tokenize-asset", (context) =>
      ledger.tokenizeAsset(context, parsed),
    );
    if (!result.ok) return sendFailure(reply, result);

    const response: TokenizeAssetResponse = { assetId: result.value };
    return reply.code(201).send(response);
  });

  app.post("/assets/:assetId/transfers", async (req, reply) => {
    const caller = authorizeMutation(req, reply);
    if (!caller) return;

    const params = req.params as { assetId?: string };
    const assetId = parseIdParam(params.assetId);
    if (assetId === null) {
      return reply.code(400).send({ error: "invalid_asset_id" });
    }
    const parsed = parseTransferRequest(req.body, assetId);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected recipient and integer units",
      });
    }

    const result = await executeTransition(caller, "execute-ownership-transfer", (context) =>
      ledger.executeOwnershipTransfer(context, parsed),
    );
    if (!result.ok) return sendFailure(reply, result);

    const response: TransferOwnershipResponse = { transferred: result.value };
    return response;
  });

  app.put("/assets/:assetId/compliance/:participant", async (req, reply) => {
    const caller = authorizeMutation(req, reply);
    if (!caller) return;

    const params = req.params as { assetId?: string; participant?: string };
    const assetId = parseIdParam(params.assetId);
    if (assetId === null) {
      return reply.code(400).send({ error: "invalid_asset_id" });
    }
    const parsed = parseComplianceRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected boolean approved",
      });
    }
    const participant = params.participant || "";

    const result = await executeTransition(caller, "update-compliance-status", (context) =>
      ledger.updateComplianceStatus(context, {
        assetId,
        participant,
        approved: parsed.approved,
      }),
    );
    if (!result.ok) return sendFailure(reply, result);

    const response: UpdateComplianceResponse = { approved: result.value };
    return response;
  });

  app.put("/assets/:assetId/transfer-status", async (req, reply) => {
    const caller = authorizeMutation(req, reply);
    if (!caller) return;

    const params = req.params as { assetId?: string };
    const assetId = parseIdParam(params.assetId);
    if (assetId === null) {
      return reply.code(400).send({ error: "invalid_asset_id" });
    }
    const parsed = parseTransferStatusRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected boolean enabled",
      });
    }

    const result = await executeTransition(caller, "set-transfer-enabled", (context) =>
      ledger.setTransferEnabled(context, { assetId, enabled: parsed.enabled }),
    );
    if (!result.ok) return sendFailure(reply, result);

    const response: SetTransferStatusResponse = { enabled: result.value };
    return response;
  });

  app.get("/assets/:assetId", async (req, reply) => {
    const params = req.params as { assetId?: string };
    const assetId = parseIdParam(params.assetId);
    if (assetId === null) {
      return reply.code(400).send({ error: "invalid_asset_id" });
    }
    const asset = ledger.getAssetDetails(assetId);
    if (!asset) {
      return reply.code(404).send({ error: "asset_not_found" });
    }
    const response: GetAssetResponse = { asset: toAssetDetails(asset) };
    return response;
  });

  app.get("/assets/:assetId/positions/:holder", async (req, reply) => {
    const params = req.params as { assetId?: string; holder?: string };
    const assetId = parseIdParam(params.assetId);
    if (assetId === null) {
      return reply.code(400).send({ error: "invalid_asset_id" });
    }
    const holder = params.holder || "";
    const response: GetPositionResponse = toPositionView({
      assetId,
      holder,
      units: ledger.getOwnershipPosition(assetId, holder),
    });
    return response;
  });

  app.get("/assets/:assetId/compliance/:participant", async (req, reply) => {
    const params = req.params as { assetId?: string; participant?: string };
    const assetId = parseIdParam(params.assetId);
    if (assetId === null) {
      return reply.code(400).send({ error: "invalid_asset_id" });
    }
    const participant = params.participant || "";
    const record = ledger.getComplianceStatus(assetId, participant);
    const response: GetComplianceResponse = {
      assetId,
      participant,
      compliant: record?.compliant === true,
      record: record ? toComplianceView(record) : null,
    };
    return response;
  });

  app.get("/assets/:assetId/certificate", async (req, reply) => {
    const params = req.params as { assetId?: string };
    const assetId = parseIdParam(params.assetId);
    if (assetId === null) {
      return reply.code(400).send({ error: "invalid_asset_id" });
    }
    const holder = ledger.getCertificateHolder(assetId);
    if (holder === null) {
      return reply.code(404).send({ error: "certificate_not_found" });
    }
    const response: GetCertificateResponse = { assetId, holder };
    return response;
  });

  app.get("/assets/:assetId/holders", async (req, reply) => {
    const params = req.params as { assetId?: string };
    const assetId = parseIdParam(params.assetId);
    if (assetId === null) {
      return reply.code(400).send({ error: "invalid_asset_id" });
    }
    const response: ListHoldersResponse = {
      assetId,
      positions: ledger.listAssetHolders(assetId).map(toPositionView),
    };
    return response;
  });

  app.get("/assets/:assetId/events", async (req, reply) => {
    const params = req.params as { assetId?: string };
    const assetId = parseIdParam(params.assetId);
    if (assetId === null) {
      return reply.code(400).send({ error: "invalid_asset_id" });
    }
    const response: GetAssetEventsResponse = {
      assetId,
      events: ledger.listAssetEvents(assetId),
    };
    return response;
  });

  app.get("/transactions/:txId", async (req, reply) => {
    const params = req.params as { txId?: string };
    const txId = parseIdParam(params.txId);
    if (txId === null) {
      return reply.code(400).send({ error: "invalid_transaction_id" });
    }
    const event = ledger.getTransactionRecord(txId);
    if (!event) {
      return reply.code(404).send({ error: "transaction_not_found" });
    }
    const response: GetTransactionResponse = { event };
    return response;
  });

  app.get("/stats", async () => {
    const response: GetStatisticsResponse = ledger.getProtocolStatistics();
    return response;
  });

  app.addHook("onClose", async () => {
    await queueTail;
    if (ownHeightSource) {
      heightSource.close();
    }
    if (ownStore) {
      store.close();
    }
  });

  return app;
}
