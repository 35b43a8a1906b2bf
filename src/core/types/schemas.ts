import { z } from "zod";

export const authorityInfoSchema = z.object({
  token_endpoint: z.string().url()
});

const tokenKeySchema = z
  .object({
    kid: z.string().min(1),
    kty: z.string().optional(),
    alg: z.string().optional(),
    use: z.string().optional(),
    n: z.string().min(1).optional(),
    e: z.string().min(1).optional(),
    value: z.string().min(1).optional()
  })
  .passthrough()
  .refine((key) => (key.n !== undefined && key.e !== undefined) || key.value !== undefined, {
    message: "Token key must carry an RSA modulus and exponent or a PEM value."
  });

export type TokenKey = z.infer<typeof tokenKeySchema>;

export const tokenKeysSchema = z.object({
  keys: z.array(tokenKeySchema)
});

export const permissionsSchema = z.object({
  read_sensitive_data: z.boolean().optional(),
  read_basic_data: z.boolean().optional(),
  roles: z.array(z.string()).optional()
});

export type PermissionsDocument = z.infer<typeof permissionsSchema>;

export const tokenHeaderSchema = z
  .object({
    alg: z.string().optional(),
    kid: z.string().optional(),
    typ: z.string().optional()
  })
  .passthrough();

// Latest instant a Date can hold, in NumericDate seconds.
const MAX_EXPIRY_SECONDS = 8.64e12;

export const tokenPayloadSchema = z
  .object({
    jti: z.string().optional(),
    sub: z.string().optional(),
    iss: z.string().optional(),
    exp: z.number().finite().max(MAX_EXPIRY_SECONDS).optional(),
    aud: z.union([z.string(), z.array(z.string())]).optional(),
    scope: z.union([z.string(), z.array(z.string())]).optional()
  })
  .passthrough();

export const writeBodySchema = z.record(z.unknown());

export const infoContributionSchema = z.record(z.unknown());
