/**
 * JSON Schema (draft-07) for a single monitor definition
 */

const codeDirective = {
  type: "object",
  required: ["dispatch", "notify"],
  properties: {
    dispatch: { type: "boolean" },
    notify: { type: "string", minLength: 1 },
    config: { type: "object" },
  },
} as const;

export const MONITOR_SCHEMA = {
  $schema: "http://json-schema.org/draft-07/schema#",
  type: "object",
  required: ["name", "pulse_check"],
  properties: {
    name: { type: "string", minLength: 1, maxLength: 100 },
    pulse_check: {
      type: "object",
      required: ["type", "config"],
      properties: {
        type: { enum: ["http", "tcp", "icmp"] },
        interval: { type: "string" },
        timeout: { type: "string" },
        max_failures: { type: "integer", minimum: 0 },
        config: { type: "object" },
      },
      allOf: [
        {
          if: { properties: { type: { const: "http" } } },
          then: {
            properties: {
              config: {
                required: ["url"],
                properties: { url: { type: "string", minLength: 1 } },
              },
            },
          },
        },
        {
          if: { properties: { type: { const: "tcp" } } },
          then: {
            properties: {
              config: {
                required: ["host", "port"],
                properties: {
                  host: { type: "string", minLength: 1 },
                  port: { type: "integer", minimum: 1, maximum: 65535 },
                },
              },
            },
          },
        },
        {
          if: { properties: { type: { const: "icmp" } } },
          then: {
            properties: {
              config: {
                required: ["host"],
                properties: { host: { type: "string", minLength: 1 } },
              },
            },
          },
        },
      ],
    },
    codes: {
      type: "object",
      additionalProperties: codeDirective,
    },
  },
} as const;
