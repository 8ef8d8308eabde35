/**
 * Credential Bridge
 *
 * Purpose: turn a PKCS#12 (.p12/.pfx) client certificate bundle into two
 * ephemeral PEM files a TLS client can load, and guarantee their deletion.
 *
 * Key behaviors:
 * - Parse the container with node-forge; a bad container or a rejected
 *   passphrase is a CertificateFormatError
 * - Write the certificate (leaf first, then any chain certificates) and the
 *   unencrypted PKCS#8 private key to uniquely named files, mode 0600
 * - release() is idempotent and never throws; deletion failures are recorded
 *   in the returned ReleaseReport
 * - withKeyMaterial() scopes one acquisition to one callback
 *
 * The temporary directory is the only place key material exists outside
 * memory, so files live exactly as long as one send operation.
 */

import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import forge from 'node-forge';
import { v4 as uuidv4 } from 'uuid';
import { CertificateFormatError, errorCode, errorMessage } from '../model/DispatchErrors.js';
import { getLogger, registerComponent } from '../logging/index.js';

registerComponent('credential-bridge', 'PKCS#12 to ephemeral PEM conversion');
const logger = getLogger('credential-bridge');

/** Owner read/write only */
const KEY_FILE_MODE = 0o600;

/**
 * PKCS#12 bytes plus passphrase for one send operation.
 * The passphrase is never logged.
 */
export interface CredentialBundle {
  pkcs12: Buffer;
  passphrase: string;
  /** Where the bundle came from, for diagnostics only */
  source?: string;
}

export interface ReleaseFailure {
  path: string;
  message: string;
}

/**
 * Outcome of a release call
 */
export interface ReleaseReport {
  /** Files deleted by this release */
  removed: string[];
  /** Deletion failures; recorded, never raised */
  errors: ReleaseFailure[];
}

/**
 * Handles to the two PEM files of one operation
 */
export interface EphemeralKeyMaterial {
  readonly certPath: string;
  readonly keyPath: string;
  /** Subject of the client certificate, e.g. "CN=ACME SL" */
  readonly subject: string;
  readonly released: boolean;
  release(): Promise<ReleaseReport>;
}

export interface CredentialBridgeOptions {
  /** Directory for the PEM files (default: OS temp dir) */
  tempDir?: string;
  /** File name prefix (default: "aeat-dispatch") */
  filePrefix?: string;
}

interface ExtractedCredentials {
  certificatePem: string;
  privateKeyPem: string;
  subject: string;
}

class EphemeralKeyMaterialHandle implements EphemeralKeyMaterial {
  private releasePromise: Promise<ReleaseReport> | null = null;

  constructor(
    readonly certPath: string,
    readonly keyPath: string,
    readonly subject: string
  ) {}

  get released(): boolean {
    return this.releasePromise !== null;
  }

  release(): Promise<ReleaseReport> {
    if (!this.releasePromise) {
      this.releasePromise = removeFiles([this.certPath, this.keyPath]);
    }
    return this.releasePromise;
  }
}

async function removeFiles(paths: string[]): Promise<ReleaseReport> {
  const report: ReleaseReport = { removed: [], errors: [] };

  for (const filePath of paths) {
    try {
      await fs.unlink(filePath);
      report.removed.push(filePath);
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        continue;
      }
      const message = errorMessage(error);
      report.errors.push({ path: filePath, message });
      logger.warn(`Could not delete temporary key file ${filePath}: ${message}`);
    }
  }

  logger.debug(`Temporary PEM files released (${report.removed.length} removed, ${report.errors.length} failed)`);
  return report;
}

function isRsaPublicKey(key: forge.pki.PublicKey): key is forge.pki.rsa.PublicKey {
  return !(key instanceof Uint8Array) && 'n' in key && 'e' in key;
}

function collectBags(p12: forge.pkcs12.Pkcs12Pfx, bagType: string): forge.pkcs12.Bag[] {
  return p12.getBags({ bagType })[bagType] ?? [];
}

function formatSubject(cert: forge.pki.Certificate): string {
  return cert.subject.attributes
    .map((attr) => `${attr.shortName ?? attr.name ?? attr.type}=${String(attr.value)}`)
    .join(', ');
}

/**
 * Parse a PKCS#12 container and pull out the private key and its certificate.
 * Errors from node-forge are replaced so that nothing derived from the
 * passphrase ends up in a message.
 */
export function extractCredentials(pkcs12: Buffer, passphrase: string): ExtractedCredentials {
  let p12: forge.pkcs12.Pkcs12Pfx;
  try {
    const p12Asn1 = forge.asn1.fromDer(pkcs12.toString('binary'));
    p12 = forge.pkcs12.pkcs12FromAsn1(p12Asn1, passphrase);
  } catch (error) {
    const message = errorMessage(error);
    if (message.includes('MAC could not be verified') || message.includes('Invalid password')) {
      throw new CertificateFormatError('PKCS#12 passphrase rejected by the container integrity check');
    }
    throw new CertificateFormatError('PKCS#12 container could not be parsed');
  }

  const keys = [
    ...collectBags(p12, forge.pki.oids.pkcs8ShroudedKeyBag),
    ...collectBags(p12, forge.pki.oids.keyBag),
  ]
    .map((bag) => bag.key)
    .filter((key): key is forge.pki.rsa.PrivateKey => key !== undefined && key !== null);

  const privateKey = keys[0];
  if (!privateKey) {
    throw new CertificateFormatError('PKCS#12 container holds no private key');
  }

  const certificates = collectBags(p12, forge.pki.oids.certBag)
    .map((bag) => bag.cert)
    .filter((cert): cert is forge.pki.Certificate => cert !== undefined);

  if (certificates.length === 0) {
    throw new CertificateFormatError('PKCS#12 container holds no certificate');
  }

  const keyFingerprint = forge.pki.publicKeyToPem(forge.pki.rsa.setPublicKey(privateKey.n, privateKey.e));
  const leaf =
    certificates.find(
      (cert) => isRsaPublicKey(cert.publicKey) && forge.pki.publicKeyToPem(cert.publicKey) === keyFingerprint
    ) ?? certificates[0];

  if (!leaf) {
    throw new CertificateFormatError('PKCS#12 container holds no certificate');
  }

  const chain = certificates.filter((cert) => cert !== leaf);
  const certificatePem = [leaf, ...chain].map((cert) => forge.pki.certificateToPem(cert)).join('');

  const privateKeyPem = forge.pki.privateKeyInfoToPem(
    forge.pki.wrapRsaPrivateKey(forge.pki.privateKeyToAsn1(privateKey))
  );

  return { certificatePem, privateKeyPem, subject: formatSubject(leaf) };
}

/**
 * Read a PKCS#12 bundle from disk. A missing or unreadable file is a
 * certificate error: no network call can follow without it.
 */
export async function loadCredentialBundle(bundlePath: string, passphrase: string): Promise<CredentialBundle> {
  try {
    const pkcs12 = await fs.readFile(bundlePath);
    return { pkcs12, passphrase, source: bundlePath };
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      throw new CertificateFormatError(`Certificate file does not exist: ${bundlePath}`, { cause: error });
    }
    const message = errorMessage(error);
    throw new CertificateFormatError(`Certificate file could not be read: ${message}`, { cause: error });
  }
}

export class CredentialBridge {
  private readonly tempDir: string;
  private readonly filePrefix: string;

  constructor(options: CredentialBridgeOptions = {}) {
    this.tempDir = options.tempDir ?? os.tmpdir();
    this.filePrefix = options.filePrefix ?? 'aeat-dispatch';
  }

  /**
   * Parse the bundle and write its key material to two fresh PEM files.
   */
  async materialize(pkcs12: Buffer, passphrase: string): Promise<EphemeralKeyMaterial> {
    const credentials = extractCredentials(pkcs12, passphrase);

    const id = uuidv4();
    const certPath = path.join(this.tempDir, `${this.filePrefix}-${id}-cert.pem`);
    const keyPath = path.join(this.tempDir, `${this.filePrefix}-${id}-key.pem`);
    const handle = new EphemeralKeyMaterialHandle(certPath, keyPath, credentials.subject);

    try {
      await fs.writeFile(certPath, credentials.certificatePem, { mode: KEY_FILE_MODE, flag: 'wx' });
      await fs.writeFile(keyPath, credentials.privateKeyPem, { mode: KEY_FILE_MODE, flag: 'wx' });
    } catch (error) {
      await handle.release();
      const message = errorMessage(error);
      throw new CertificateFormatError(`Temporary PEM files could not be written: ${message}`, { cause: error });
    }

    logger.debug(`Client certificate materialized (${credentials.subject})`, { certPath, keyPath });
    return handle;
  }

  /**
   * Delete the files of `material`. Safe to call more than once.
   */
  release(material: EphemeralKeyMaterial): Promise<ReleaseReport> {
    return material.release();
  }

  /**
   * Scoped acquisition: materialize, run `fn`, release on every exit path.
   * A release failure never replaces the outcome of `fn`; it is only
   * reported to `onRelease`.
   */
  async withKeyMaterial<T>(
    bundle: CredentialBundle,
    fn: (material: EphemeralKeyMaterial) => Promise<T>,
    onRelease?: (report: ReleaseReport) => void
  ): Promise<T> {
    const material = await this.materialize(bundle.pkcs12, bundle.passphrase);
    try {
      return await fn(material);
    } finally {
      const report = await material.release();
      onRelease?.(report);
    }
  }
}
