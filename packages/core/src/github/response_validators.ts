import Ajv from 'ajv';
import type { ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';

import accessTokenSchema from './schemas/access_token_response.json';
import commitSchema from './schemas/commit_response.json';
import gitObjectSchema from './schemas/git_object_response.json';
import graphqlCommitSchema from './schemas/graphql_commit_response.json';
import referenceSchema from './schemas/reference_response.json';
import type {
  AccessTokenResponse,
  CommitResponse,
  GitObjectResponse,
  GraphQLCommitResponse,
  ReferenceResponse,
} from './github.types';

const ajv = new Ajv({ allErrors: true });
addFormats(ajv);

export const validateAccessTokenResponse: ValidateFunction<AccessTokenResponse> =
  ajv.compile<AccessTokenResponse>(accessTokenSchema);

export const validateGitObjectResponse: ValidateFunction<GitObjectResponse> =
  ajv.compile<GitObjectResponse>(gitObjectSchema);

export const validateCommitResponse: ValidateFunction<CommitResponse> =
  ajv.compile<CommitResponse>(commitSchema);

export const validateReferenceResponse: ValidateFunction<ReferenceResponse> =
  ajv.compile<ReferenceResponse>(referenceSchema);

export const validateGraphQLCommitResponse: ValidateFunction<GraphQLCommitResponse> =
  ajv.compile<GraphQLCommitResponse>(graphqlCommitSchema);

/** Human-readable summary of the last validation failure */
export function describeValidationErrors(validate: ValidateFunction): string {
  return ajv.errorsText(validate.errors);
}
