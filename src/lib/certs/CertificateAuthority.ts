/**
 * Abstract interface for the certificate toolchain
 *
 * Connector identities are produced by an external crypto toolchain
 * (openssl by default). Provisioning code only talks to this interface.
 *
 * All operations work on file paths: the toolchain reads its inputs from
 * disk and writes its outputs to disk, overwriting existing files.
 *
 * @license Apache-2.0
 */

export interface SelfSignOptions {
  /** PEM private key to sign with */
  keyPath: string;
  /** Where to write the PEM certificate */
  certPath: string;
  /** Subject common name (`CN=<commonName>`) */
  commonName: string;
  /** Validity period, starting now */
  validityDays: number;
}

export interface Pkcs12Options {
  keyPath: string;
  certPath: string;
  /** Where to write the PKCS12 archive */
  outPath: string;
  /** Friendly name of the key entry */
  alias: string;
  /** Export password */
  password: string;
}

export interface CertificateAuthority {
  /**
   * Generate an RSA private key
   *
   * @throws ProvisioningError (TOOL_FAILURE) if the toolchain fails
   */
  generatePrivateKey(keyPath: string): Promise<void>;

  /**
   * Issue a self-signed X.509 certificate for an existing private key
   *
   * @throws ProvisioningError (TOOL_FAILURE) if the toolchain fails
   */
  selfSignCertificate(options: SelfSignOptions): Promise<void>;

  /**
   * Bundle key and certificate into a password-protected PKCS12 archive
   *
   * @throws ProvisioningError (TOOL_FAILURE) if the toolchain fails
   */
  exportPkcs12(options: Pkcs12Options): Promise<void>;

  /**
   * Check if the toolchain can be used
   */
  isAvailable(): Promise<boolean>;

  /**
   * Backend type identifier ('openssl')
   */
  getBackendType(): string;
}
