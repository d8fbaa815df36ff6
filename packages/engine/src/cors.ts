import type { Attributes, CorsDeclaration, ResourceNode } from "@stacksmith/shared";

const HEADER_PREFIX = "method.response.header.Access-Control-Allow-";

function quoted(values: string[]): string {
  return `'${values.join(",")}'`;
}

/**
 * Render a CORS declaration into the OPTIONS method, mock integration and the
 * response nodes API gateways need for a preflight. Option values are copied
 * through as header values without being interpreted.
 */
export function renderCorsNodes(declaration: CorsDeclaration): ResourceNode[] {
  const { id } = declaration;
  const target: Attributes = {
    restApiId: { $ref: declaration.restApi, attr: "id" },
    resourceId: { $ref: declaration.resource, attr: "id" },
    httpMethod: "OPTIONS",
  };

  const methodId = `${id}-method`;
  const integrationId = `${id}-integration`;
  const methodResponseId = `${id}-method-response`;

  return [
    {
      id: methodId,
      kind: "Method",
      attributes: { ...target, authorization: "NONE" },
      dependsOn: [],
    },
    {
      id: integrationId,
      kind: "Integration",
      attributes: {
        ...target,
        type: "MOCK",
        requestTemplates: { "application/json": '{"statusCode": 200}' },
      },
      dependsOn: [methodId],
    },
    {
      id: methodResponseId,
      kind: "MethodResponse",
      attributes: {
        ...target,
        statusCode: "200",
        responseModels: { "application/json": "Empty" },
        responseParameters: {
          [`${HEADER_PREFIX}Headers`]: true,
          [`${HEADER_PREFIX}Methods`]: true,
          [`${HEADER_PREFIX}Origin`]: true,
        },
      },
      dependsOn: [methodId],
    },
    {
      id: `${id}-integration-response`,
      kind: "IntegrationResponse",
      attributes: {
        ...target,
        statusCode: "200",
        responseParameters: {
          [`${HEADER_PREFIX}Headers`]: quoted(declaration.allowedHeaders),
          [`${HEADER_PREFIX}Methods`]: quoted(declaration.allowedMethods),
          [`${HEADER_PREFIX}Origin`]: quoted(declaration.allowedOrigins),
        },
      },
      dependsOn: [integrationId, methodResponseId],
    },
  ];
}
