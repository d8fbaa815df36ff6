import { z } from "zod";
import { RESOURCE_KINDS, type JsonValue } from "./resource.js";

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

export const stackResourceSchema = z
  .object({
    id: z.string().min(1),
    kind: z.enum(RESOURCE_KINDS),
    attributes: z.record(jsonValueSchema).default({}),
    dependsOn: z.array(z.string().min(1)).default([]),
    triggers: z.array(z.string().min(1)).optional(),
    lifecycle: z
      .object({ replaceOnTrigger: z.boolean().optional() })
      .optional(),
    // Path to the packaged function artifact, relative to the stack file
    artifact: z.string().min(1).optional(),
  })
  .refine((r) => r.artifact === undefined || r.kind === "Function", {
    message: "artifact is only valid on Function resources",
    path: ["artifact"],
  });

export const corsDeclarationSchema = z.object({
  id: z.string().min(1),
  restApi: z.string().min(1),
  resource: z.string().min(1),
  allowedHeaders: z.array(z.string().min(1)).min(1),
  allowedMethods: z.array(z.string().min(1)).min(1),
  allowedOrigins: z.array(z.string().min(1)).min(1),
});

export const stackSchema = z.object({
  name: z.string().min(1),
  resources: z.array(stackResourceSchema),
  cors: z.array(corsDeclarationSchema).default([]),
});

export type StackResource = z.infer<typeof stackResourceSchema>;
export type StackFile = z.infer<typeof stackSchema>;

export function parseStack(raw: unknown): StackFile {
  return stackSchema.parse(raw);
}
