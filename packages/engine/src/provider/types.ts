import type { Attributes, ResourceKind } from "@stacksmith/shared";

export interface CreateResult {
  externalId: string;
  attributes: Attributes;
}

/**
 * The provisioning service the executor drives. Implementations signal
 * failure with `ProviderError`; anything else is treated as permanent.
 */
export interface ProvisioningProvider {
  create(kind: ResourceKind, attributes: Attributes): Promise<CreateResult>;
  update(externalId: string, attributes: Attributes): Promise<Attributes>;
  destroy(externalId: string): Promise<void>;
}
