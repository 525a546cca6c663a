// backend/services/phone-address/src/openapi.ts

/**
 * OpenAPI 3.0 description of the public routes, served at /openapi.json.
 * The title is the configured service display name.
 */

export const API_VERSION = "1.0.0";

type OpenApiOptions = {
  title: string;
  apiPrefix: string;
};

const problemRef = { $ref: "#/components/schemas/Problem" };
const recordRef = { $ref: "#/components/schemas/PhoneAddress" };

function problemResponse(description: string) {
  return {
    description,
    content: { "application/problem+json": { schema: problemRef } },
  };
}

function recordResponse(description: string) {
  return {
    description,
    content: { "application/json": { schema: recordRef } },
  };
}

const phoneParam = {
  name: "phone",
  in: "path",
  required: true,
  description: "Phone number used as the storage key.",
  schema: { type: "string", minLength: 1 },
};

export function buildOpenApiDocument(opts: OpenApiOptions) {
  const base = `${opts.apiPrefix}/phone-addresses`;

  return {
    openapi: "3.0.3",
    info: {
      title: opts.title,
      version: API_VERSION,
      description:
        'Stores and manages "phone - address" pairs in a key-value store.',
    },
    tags: [{ name: "Phone-address management" }, { name: "Service" }],
    paths: {
      [base]: {
        post: {
          tags: ["Phone-address management"],
          summary: "Create new phone-address record",
          requestBody: {
            required: true,
            content: {
              "application/json": {
                schema: { $ref: "#/components/schemas/PhoneAddressCreate" },
              },
            },
          },
          responses: {
            "201": recordResponse("Record created."),
            "409": problemResponse("Phone number already exists."),
            "422": problemResponse("Request body failed validation."),
          },
        },
      },
      [`${base}/{phone}`]: {
        parameters: [phoneParam],
        get: {
          tags: ["Phone-address management"],
          summary: "Get address by phone number",
          responses: {
            "200": recordResponse("Record found."),
            "404": problemResponse("Phone number was not found."),
          },
        },
        put: {
          tags: ["Phone-address management"],
          summary: "Update existing phone-address record",
          requestBody: {
            required: true,
            content: {
              "application/json": {
                schema: { $ref: "#/components/schemas/PhoneAddressUpdate" },
              },
            },
          },
          responses: {
            "200": recordResponse("Record updated."),
            "404": problemResponse("Phone number not found; nothing to update."),
            "422": problemResponse("Request body failed validation."),
          },
        },
        delete: {
          tags: ["Phone-address management"],
          summary: "Delete phone-address record",
          responses: {
            "204": { description: "Record deleted." },
            "404": problemResponse("Phone number not found; nothing to delete."),
          },
        },
      },
      "/health": {
        get: {
          tags: ["Service"],
          summary: "Health check",
          responses: { "200": { description: "Service and store status." } },
        },
      },
    },
    components: {
      schemas: {
        PhoneAddress: {
          type: "object",
          required: ["phone", "address"],
          properties: {
            phone: { type: "string", example: "+7 999 123-45-67" },
            address: { type: "string", example: "Moscow, Tverskaya street, 1" },
          },
        },
        PhoneAddressCreate: {
          type: "object",
          required: ["phone", "address"],
          properties: {
            phone: { type: "string", minLength: 3, maxLength: 64 },
            address: { type: "string", minLength: 1, maxLength: 1024 },
          },
        },
        PhoneAddressUpdate: {
          type: "object",
          required: ["address"],
          properties: {
            address: { type: "string", minLength: 1, maxLength: 1024 },
          },
        },
        Problem: {
          type: "object",
          required: ["type", "title", "status"],
          properties: {
            type: { type: "string" },
            title: { type: "string" },
            status: { type: "integer" },
            code: { type: "string" },
            detail: { type: "string" },
            instance: { type: "string" },
            errors: { type: "array", items: { type: "object" } },
          },
        },
      },
    },
  } as const;
}
