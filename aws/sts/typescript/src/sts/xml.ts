/**
 * STS XML Response Parsing Utilities
 *
 * STS answers Query API calls with XML; this module converts the AssumeRole
 * result into the typed payload.
 *
 * @module sts/xml
 */

import type { AssumeRoleOutput } from '../types/responses.js';
import { StsError, decodeXmlEntities } from '../error/index.js';

/**
 * Extract the text content of the first element with the given tag.
 *
 * @returns Text content, or undefined if not found
 */
function getTextContent(xml: string, tagName: string): string | undefined {
  const regex = new RegExp(`<${tagName}>([^<]*)</${tagName}>`);
  const match = xml.match(regex);
  const text = match?.[1];
  return text === undefined ? undefined : decodeXmlEntities(text.trim());
}

/**
 * Extract the inner XML of the first element with the given tag.
 */
function getElement(xml: string, tagName: string): string | undefined {
  const regex = new RegExp(`<${tagName}>([\\s\\S]*?)</${tagName}>`);
  return xml.match(regex)?.[1];
}

/**
 * Parse ISO 8601 datetime string to Date object.
 */
function parseDateTime(dateStr: string): Date | undefined {
  const date = new Date(dateStr);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

/**
 * Parse AssumeRole response XML.
 *
 * @throws {StsError} With code `AWS_API` if required fields are missing
 *
 * @example
 * ```typescript
 * const xml = `
 *   <AssumeRoleResponse>
 *     <AssumeRoleResult>
 *       <Credentials>
 *         <AccessKeyId>test-access-key</AccessKeyId>
 *         <SecretAccessKey>test-secret</SecretAccessKey>
 *         <SessionToken>test-session-token</SessionToken>
 *         <Expiration>2030-01-01T12:00:00Z</Expiration>
 *       </Credentials>
 *       <AssumedRoleUser>
 *         <AssumedRoleId>AROATESTROLEID:session-name</AssumedRoleId>
 *         <Arn>arn:aws:sts::123456789012:assumed-role/RoleName/session-name</Arn>
 *       </AssumedRoleUser>
 *     </AssumeRoleResult>
 *   </AssumeRoleResponse>
 * `;
 *
 * const output = parseAssumeRoleResponse(xml);
 * console.log(output.Credentials.AccessKeyId); // "test-access-key"
 * ```
 */
export function parseAssumeRoleResponse(xml: string): AssumeRoleOutput {
  const credentials = getElement(xml, 'Credentials') ?? '';
  const user = getElement(xml, 'AssumedRoleUser') ?? '';

  const accessKeyId = getTextContent(credentials, 'AccessKeyId');
  const secretAccessKey = getTextContent(credentials, 'SecretAccessKey');
  const sessionToken = getTextContent(credentials, 'SessionToken');
  const expirationStr = getTextContent(credentials, 'Expiration');
  const arn = getTextContent(user, 'Arn');
  const assumedRoleId = getTextContent(user, 'AssumedRoleId');

  const expiration = expirationStr ? parseDateTime(expirationStr) : undefined;

  if (!accessKeyId || !secretAccessKey || !sessionToken || !expiration || !arn || !assumedRoleId) {
    throw new StsError('Invalid AssumeRole response: missing required fields', 'AWS_API', {
      requestId: getTextContent(xml, 'RequestId'),
    });
  }

  const output: AssumeRoleOutput = {
    Credentials: {
      AccessKeyId: accessKeyId,
      SecretAccessKey: secretAccessKey,
      SessionToken: sessionToken,
      Expiration: expiration,
    },
    AssumedRoleUser: {
      Arn: arn,
      AssumedRoleId: assumedRoleId,
    },
  };

  const packedPolicySize = getTextContent(xml, 'PackedPolicySize');
  if (packedPolicySize !== undefined && /^\d+$/.test(packedPolicySize)) {
    output.PackedPolicySize = Number(packedPolicySize);
  }

  return output;
}
