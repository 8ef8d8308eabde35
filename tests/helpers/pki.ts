/**
 * Test PKI: RSA keys, certificates and PKCS#12 bundles generated at test time.
 */

import crypto from 'crypto';
import forge from 'node-forge';

export interface KeyPair {
  privateKey: forge.pki.rsa.PrivateKey;
  publicKey: forge.pki.rsa.PublicKey;
}

export interface IssuedCertificate {
  keys: KeyPair;
  cert: forge.pki.Certificate;
  certPem: string;
  keyPem: string;
}

export interface CertificateOptions {
  commonName: string;
  organization?: string;
  isCa?: boolean;
  issuer?: IssuedCertificate;
  /** DNS names and IP addresses for the subjectAltName extension */
  dnsNames?: string[];
  ipAddresses?: string[];
}

let serialCounter = 0;

/**
 * Node generates the key (fast); forge wraps it for certificate work.
 */
export function generateKeyPair(): KeyPair {
  const { privateKey, publicKey } = crypto.generateKeyPairSync('rsa', {
    modulusLength: 2048,
    publicKeyEncoding: { type: 'spki', format: 'pem' },
    privateKeyEncoding: { type: 'pkcs1', format: 'pem' },
  });
  return {
    privateKey: forge.pki.privateKeyFromPem(privateKey),
    publicKey: forge.pki.publicKeyFromPem(publicKey),
  };
}

export function issueCertificate(options: CertificateOptions): IssuedCertificate {
  const keys = generateKeyPair();
  const cert = forge.pki.createCertificate();
  cert.publicKey = keys.publicKey;
  serialCounter += 1;
  cert.serialNumber = `01${serialCounter.toString(16).padStart(6, '0')}`;
  cert.validity.notBefore = new Date(Date.now() - 60 * 60 * 1000);
  cert.validity.notAfter = new Date(Date.now() + 24 * 60 * 60 * 1000);

  const subject = [{ name: 'commonName', value: options.commonName }];
  if (options.organization) {
    subject.push({ name: 'organizationName', value: options.organization });
  }
  cert.setSubject(subject);
  cert.setIssuer(options.issuer ? options.issuer.cert.subject.attributes : subject);

  const extensions: object[] = [
    { name: 'basicConstraints', cA: options.isCa === true },
    options.isCa
      ? { name: 'keyUsage', keyCertSign: true, cRLSign: true, digitalSignature: true }
      : { name: 'keyUsage', digitalSignature: true, keyEncipherment: true },
  ];
  if (!options.isCa) {
    extensions.push({ name: 'extKeyUsage', serverAuth: true, clientAuth: true });
  }
  const altNames = [
    ...(options.dnsNames ?? []).map((value) => ({ type: 2, value })),
    ...(options.ipAddresses ?? []).map((ip) => ({ type: 7, ip })),
  ];
  if (altNames.length > 0) {
    extensions.push({ name: 'subjectAltName', altNames });
  }
  cert.setExtensions(extensions);

  const signingKey = options.issuer ? options.issuer.keys.privateKey : keys.privateKey;
  cert.sign(signingKey, forge.md.sha256.create());

  return {
    keys,
    cert,
    certPem: forge.pki.certificateToPem(cert),
    keyPem: forge.pki.privateKeyToPem(keys.privateKey),
  };
}

/**
 * Encode key and certificates as a password-protected PKCS#12 container
 */
export function buildPkcs12(
  identity: IssuedCertificate,
  passphrase: string,
  chain: IssuedCertificate[] = []
): Buffer {
  const asn1 = forge.pkcs12.toPkcs12Asn1(
    identity.keys.privateKey,
    [identity.cert, ...chain.map((entry) => entry.cert)],
    passphrase,
    { algorithm: '3des' }
  );
  return Buffer.from(forge.asn1.toDer(asn1).getBytes(), 'binary');
}

export interface TestPki {
  ca: IssuedCertificate;
  server: IssuedCertificate;
  client: IssuedCertificate;
}

/**
 * A CA with a localhost server certificate and a client certificate
 */
export function createTestPki(): TestPki {
  const ca = issueCertificate({ commonName: 'Test Root CA', organization: 'Test Lab', isCa: true });
  const server = issueCertificate({
    commonName: 'localhost',
    issuer: ca,
    dnsNames: ['localhost'],
    ipAddresses: ['127.0.0.1'],
  });
  const client = issueCertificate({ commonName: 'ACME SL', organization: 'ACME', issuer: ca });
  return { ca, server, client };
}
