import fs from 'fs';
import { createPrivateKey, X509Certificate } from 'crypto';
import type { KeyObject } from 'crypto';
import { errorMessage } from '../errors.js';
import type { ClientAuthCredentials, KeyFormat } from '../types.js';

export type CredentialLoader = (
  certificatePath: string,
  privateKeyPath: string,
  keyFormat: KeyFormat,
  passphrase: string,
) => ClientAuthCredentials;

const PEM_CERTIFICATE_RE = /-----BEGIN CERTIFICATE-----[\s\S]+?-----END CERTIFICATE-----/g;
const DER_KEY_TYPES = ['pkcs8', 'pkcs1', 'sec1'] as const;

function readFile(filePath: string, what: string): Buffer {
  try {
    return fs.readFileSync(filePath);
  } catch (err) {
    throw new Error(`Could not open the client ${what} file`, { cause: err });
  }
}

function isBadDecrypt(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  const code = 'code' in err ? err.code : undefined;
  return code === 'ERR_OSSL_BAD_DECRYPT' || code === 'ERR_MISSING_PASSPHRASE' || /bad decrypt/i.test(err.message);
}

function loadPrivateKey(key: Buffer, keyFormat: KeyFormat, passphrase: string): KeyObject {
  const options = passphrase ? { passphrase } : {};
  if (keyFormat === 'PEM') {
    return createPrivateKey({ key, format: 'pem', ...options });
  }
  let lastErr: unknown;
  for (const type of DER_KEY_TYPES) {
    try {
      return createPrivateKey({ key, format: 'der', type, ...options });
    } catch (err) {
      lastErr = err;
      if (isBadDecrypt(err)) break;
    }
  }
  throw lastErr;
}

/** Parses every certificate in the chain; the first one is the client's. */
function parseCertificateChain(pem: string): X509Certificate[] {
  const blocks = pem.match(PEM_CERTIFICATE_RE);
  if (!blocks) throw new Error('no PEM certificate found');
  return blocks.map(block => new X509Certificate(block));
}

/**
 * Validates a client certificate chain and private key and returns the
 * credential bundle. Files are read eagerly; nothing is kept but the paths.
 */
export const loadClientAuthCredentials: CredentialLoader = (
  certificatePath,
  privateKeyPath,
  keyFormat,
  passphrase,
) => {
  const certificate = readFile(certificatePath, 'certificate');
  const key = readFile(privateKeyPath, 'private key');

  let privateKey: KeyObject;
  try {
    privateKey = loadPrivateKey(key, keyFormat, passphrase);
  } catch (err) {
    if (isBadDecrypt(err)) {
      throw new Error('Could not decrypt the client private key. Wrong passphrase?', { cause: err });
    }
    throw new Error(`The client private key is invalid: ${errorMessage(err)}`, { cause: err });
  }

  let chain: X509Certificate[];
  try {
    chain = parseCertificateChain(certificate.toString('utf8'));
  } catch (err) {
    throw new Error(`The client certificate is invalid: ${errorMessage(err)}`, { cause: err });
  }

  const [clientCertificate] = chain;
  if (clientCertificate && !clientCertificate.checkPrivateKey(privateKey)) {
    throw new Error('The client certificate does not match the private key');
  }

  return Object.freeze({ certificatePath, privateKeyPath, keyFormat, passphrase });
};
