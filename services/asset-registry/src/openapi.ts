const assetIdParam = {
  in: "path",
  name: "assetId",
  required: true,
  schema: { type: "integer", minimum: 1 },
};

function principalParam(name: string) {
  return { in: "path", name, required: true, schema: { type: "string" } };
}

const callerHeader = {
  in: "header",
  name: "x-ledger-caller",
  required: true,
  schema: { type: "string" },
};

export function buildOpenApiSpec(serviceBaseUrl: string) {
  return {
    openapi: "3.0.3",
    info: {
      title: "Asset Registry API",
      version: "1.0.0",
      description:
        "Permissioned asset registry: tokenize assets, transfer ownership units behind a compliance allow-list, and read the event log.",
    },
    servers: [{ url: serviceBaseUrl }],
    paths: {
      "/health": {
        get: {
          summary: "Health check",
          responses: { "200": { description: "Service healthy" } },
        },
      },
      "/chain/status": {
        get: {
          summary: "Sequence marker source and latest height",
          responses: { "200": { description: "Height source status" } },
        },
      },
      "/assets": {
        post: {
          summary: "Tokenize an asset; the caller becomes primary owner and certificate holder",
          parameters: [callerHeader],
          responses: {
            "201": { description: "Asset tokenized" },
            "400": { description: "Invalid parameters" },
            "401": { description: "Missing caller or service token" },
            "409": { description: "Certificate could not be minted" },
          },
        },
      },
      "/assets/{assetId}": {
        get: {
          summary: "Asset details",
          parameters: [assetIdParam],
          responses: {
            "200": { description: "Asset found" },
            "404": { description: "Asset not found" },
          },
        },
      },
      "/assets/{assetId}/transfers": {
        post: {
          summary: "Transfer ownership units from the caller to a compliant recipient",
          parameters: [assetIdParam, callerHeader],
          responses: {
            "200": { description: "Units transferred" },
            "400": { description: "Invalid parameters" },
            "403": { description: "Transfers disabled for asset" },
            "404": { description: "Asset not found" },
            "409": { description: "Insufficient ownership or certificate transfer rejected" },
            "422": { description: "Recipient not compliant" },
          },
        },
      },
      "/assets/{assetId}/compliance/{participant}": {
        get: {
          summary: "Compliance record; absent means not compliant",
          parameters: [assetIdParam, principalParam("participant")],
          responses: { "200": { description: "Compliance status" } },
        },
        put: {
          summary: "Grant or revoke compliance approval (protocol owner only)",
          parameters: [assetIdParam, principalParam("participant"), callerHeader],
          responses: {
            "200": { description: "Compliance updated" },
            "400": { description: "Invalid parameters" },
            "403": { description: "Caller is not the protocol owner" },
          },
        },
      },
      "/assets/{assetId}/transfer-status": {
        put: {
          summary: "Enable or disable transfers of an asset (protocol owner only)",
          parameters: [assetIdParam, callerHeader],
          responses: {
            "200": { description: "Transfer gate updated" },
            "403": { description: "Caller is not the protocol owner" },
            "404": { description: "Asset not found" },
          },
        },
      },
      "/assets/{assetId}/positions/{holder}": {
        get: {
          summary: "Units held; zero when the holder has no position",
          parameters: [assetIdParam, principalParam("holder")],
          responses: { "200": { description: "Ownership position" } },
        },
      },
      "/assets/{assetId}/holders": {
        get: {
          summary: "All non-zero positions of an asset",
          parameters: [assetIdParam],
          responses: { "200": { description: "Holder list" } },
        },
      },
      "/assets/{assetId}/certificate": {
        get: {
          summary: "Current certificate holder",
          parameters: [assetIdParam],
          responses: {
            "200": { description: "Certificate holder" },
            "404": { description: "Certificate not found" },
          },
        },
      },
      "/assets/{assetId}/events": {
        get: {
          summary: "Event timeline of an asset",
          parameters: [assetIdParam],
          responses: { "200": { description: "Events in transaction order" } },
        },
      },
      "/transactions/{txId}": {
        get: {
          summary: "Event by transaction id",
          parameters: [
            { in: "path", name: "txId", required: true, schema: { type: "integer", minimum: 1 } },
          ],
          responses: {
            "200": { description: "Event found" },
            "404": { description: "Transaction not found" },
          },
        },
      },
      "/stats": {
        get: {
          summary: "Total assets and total transactions",
          responses: { "200": { description: "Protocol statistics" } },
        },
      },
    },
  };
}
