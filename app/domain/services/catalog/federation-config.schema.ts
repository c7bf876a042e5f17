import { Type, type Static } from '@sinclair/typebox';
import { OPENAI_ENDPOINTS } from '../../entities';

const NonEmptyString = Type.String({ minLength: 1 });
const StringList = Type.Array(Type.String());
const OpenMap = Type.Record(Type.String(), Type.Unknown());

const AccessFields = {
  allowedGroups: Type.Optional(StringList),
  allowedDomains: Type.Optional(StringList)
};

const AdaptorFields = {
  adaptorType: NonEmptyString,
  settings: Type.Optional(OpenMap),
  extensions: Type.Optional(OpenMap)
};

export const ClusterConfigSchema = Type.Object({
  name: NonEmptyString,
  frameworks: Type.Array(NonEmptyString),
  openaiEndpoints: Type.Array(Type.Union(OPENAI_ENDPOINTS.map(endpoint => Type.Literal(endpoint)))),
  ...AdaptorFields,
  ...AccessFields
});

export const EndpointConfigSchema = Type.Object({
  slug: Type.Optional(NonEmptyString),
  cluster: NonEmptyString,
  framework: NonEmptyString,
  model: NonEmptyString,
  timeoutMs: Type.Optional(Type.Integer({ minimum: 1 })),
  ...AdaptorFields,
  ...AccessFields
});

export const FederatedTargetConfigSchema = Type.Object({
  cluster: NonEmptyString,
  framework: NonEmptyString,
  model: NonEmptyString,
  endpointSlug: Type.Optional(NonEmptyString)
});

export const FederatedEndpointConfigSchema = Type.Object({
  slug: Type.Optional(NonEmptyString),
  name: NonEmptyString,
  targetModelName: NonEmptyString,
  description: Type.Optional(Type.String()),
  targets: Type.Array(FederatedTargetConfigSchema, { minItems: 1 })
});

export type ClusterConfig = Static<typeof ClusterConfigSchema>;
export type EndpointConfig = Static<typeof EndpointConfigSchema>;
export type FederatedEndpointConfig = Static<typeof FederatedEndpointConfigSchema>;
