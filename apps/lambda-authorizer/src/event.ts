import { z } from 'zod';
import type { Decision } from 'jwt-authorizer';

/** Principal reported on Deny responses */
export const DENIED_PRINCIPAL = 'none';

export const POLICY_VERSION = '2012-10-17';
export const INVOKE_ACTION = 'execute-api:Invoke';

/**
 * Token authorizer request. Only the fields the authorizer reads are
 * validated; anything else in the event is ignored.
 */
export const tokenAuthorizerEventSchema = z.object({
  type: z.literal('TOKEN').optional(),
  authorizationToken: z.string().optional(),
  methodArn: z.string().min(1),
});

export type TokenAuthorizerEvent = z.infer<typeof tokenAuthorizerEventSchema>;

export interface PolicyStatement {
  readonly Action: string;
  readonly Effect: 'Allow' | 'Deny';
  readonly Resource: string;
}

export interface PolicyDocument {
  readonly Version: string;
  readonly Statement: readonly PolicyStatement[];
}

export interface AuthorizerResponse {
  readonly principalId: string;
  readonly policyDocument: PolicyDocument;
  readonly context?: Readonly<Record<string, string>>;
}

const policyDocument = (effect: 'Allow' | 'Deny', resource: string): PolicyDocument => ({
  Version: POLICY_VERSION,
  Statement: [{ Action: INVOKE_ACTION, Effect: effect, Resource: resource }],
});

/**
 * Response denying every resource. A cached Deny therefore covers each method
 * reached with the same token.
 */
export const denyResponse = (): AuthorizerResponse => ({
  principalId: DENIED_PRINCIPAL,
  policyDocument: policyDocument('Deny', '*'),
});

/**
 * Converts an authorization decision into the response format expected by
 * the gateway. Both effects apply to every resource so the gateway can reuse
 * a cached decision across methods.
 */
export const toAuthorizerResponse = (decision: Decision): AuthorizerResponse => {
  if (decision.effect === 'Deny') {
    return denyResponse();
  }
  return {
    principalId: decision.principalId,
    policyDocument: policyDocument('Allow', decision.resource),
    context: decision.context,
  };
};
