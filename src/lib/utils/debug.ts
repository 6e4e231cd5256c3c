/**
 * Debug logging for acme-conductor
 *
 * Output is controlled by the DEBUG environment variable (debug package):
 *
 * DEBUG=acme-conductor:* - All debug output
 * DEBUG=acme-conductor:client - Protocol events recorded by AcmeClient
 * DEBUG=acme-conductor:http - Only HTTP traffic
 */

import debug from 'debug';

export const DEBUG_NAMESPACE = 'acme-conductor';

export const debugHttp = debug(`${DEBUG_NAMESPACE}:http`);
export const debugSigner = debug(`${DEBUG_NAMESPACE}:signer`);
