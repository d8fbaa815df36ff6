import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { createLogger, parseStack } from '@stacksmith/shared';
import type { Attributes, JsonValue, ResourceNode, StackResource } from '@stacksmith/shared';
import { renderCorsNodes } from '@stacksmith/engine';
import { loadArtifact } from './artifact.js';

const logger = createLogger('stack-loader');

const ENV_PATTERN = /\$\{env:([A-Za-z_][A-Za-z0-9_]*)\}/g;

export interface LoadedStack {
  name: string;
  nodes: ResourceNode[];
}

function interpolate(value: JsonValue, env: NodeJS.ProcessEnv, where: string): JsonValue {
  if (typeof value === 'string') {
    return value.replace(ENV_PATTERN, (_match, name: string) => {
      const resolved = env[name];
      if (resolved === undefined) {
        throw new Error(`Environment variable ${name} is not set (used by ${where})`);
      }
      return resolved;
    });
  }
  if (Array.isArray(value)) {
    return value.map((item) => interpolate(item, env, where));
  }
  if (value !== null && typeof value === 'object') {
    const out: { [key: string]: JsonValue } = {};
    for (const [key, item] of Object.entries(value)) {
      out[key] = interpolate(item, env, where);
    }
    return out;
  }
  return value;
}

/**
 * Substitute `${env:NAME}` placeholders in string attribute values.
 */
export function interpolateEnv(
  resourceId: string,
  attributes: Attributes,
  env: NodeJS.ProcessEnv
): Attributes {
  const out: Attributes = {};
  for (const [field, value] of Object.entries(attributes)) {
    out[field] = interpolate(value, env, `${resourceId}.${field}`);
  }
  return out;
}

async function toNode(
  resource: StackResource,
  baseDir: string,
  env: NodeJS.ProcessEnv
): Promise<ResourceNode> {
  const attributes = interpolateEnv(resource.id, resource.attributes, env);

  if (resource.artifact) {
    const artifactPath = resolve(baseDir, resource.artifact);
    const artifact = await loadArtifact(artifactPath);
    attributes.codeHash = artifact.contentHash;
    logger.debug(`Artifact for ${resource.id}: ${artifactPath} (${artifact.content.byteLength} bytes)`);
  }

  const node: ResourceNode = {
    id: resource.id,
    kind: resource.kind,
    attributes,
    dependsOn: [...resource.dependsOn],
  };
  if (resource.triggers) node.triggers = [...resource.triggers];
  if (resource.lifecycle) node.lifecycle = { ...resource.lifecycle };
  return node;
}

/**
 * Load a stack file into resource nodes: placeholders substituted, artifacts
 * hashed and CORS declarations rendered.
 */
export async function loadStack(
  stackPath: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<LoadedStack> {
  const resolved = resolve(stackPath);
  const raw: unknown = JSON.parse(await readFile(resolved, 'utf-8'));
  const stack = parseStack(raw);
  const baseDir = dirname(resolved);

  const nodes: ResourceNode[] = [];
  for (const resource of stack.resources) {
    nodes.push(await toNode(resource, baseDir, env));
  }
  for (const declaration of stack.cors) {
    nodes.push(...renderCorsNodes(declaration));
  }

  logger.info(`Loaded stack "${stack.name}": ${nodes.length} resources`);
  return { name: stack.name, nodes };
}
