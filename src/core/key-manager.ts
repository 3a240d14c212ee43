/**
 * Key Manager - RS256 signing key lifecycle
 *
 * Owns the process's single current key pair:
 * - Generation (jose) when no stored pair exists
 * - Durable storage as PKCS#8 / SPKI PEM files
 * - Public JWK derivation for publication
 *
 * Both halves are written to temp files and renamed into place, and a
 * directory holding only one half is treated as empty. Callers therefore
 * never load a private key without its matching public key.
 */

import { access, mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  calculateJwkThumbprint,
  exportJWK,
  exportPKCS8,
  exportSPKI,
  generateKeyPair,
  importSPKI,
} from 'jose';
import type { JWKSet, PublicJWK } from './types.js';
import { IdentityErrors } from '../utils/errors.js';

export const SIGNING_ALGORITHM = 'RS256';
export const DEFAULT_MODULUS_LENGTH = 2048;

const PRIVATE_KEY_FILE = 'private_key.pem';
const PUBLIC_KEY_FILE = 'public_key.pem';

export interface KeyManagerOptions {
  /** Directory holding the PEM files (created on demand) */
  directory: string;

  /** RSA modulus size in bits (default: 2048) */
  modulusLength?: number;

  /** Published key identifier (default: RFC 7638 thumbprint of the public key) */
  keyId?: string;
}

export class KeyManager {
  private readonly privateKeyPath: string;
  private readonly publicKeyPath: string;
  private readonly modulusLength: number;
  private pending: Promise<void> | null = null;

  constructor(private readonly options: KeyManagerOptions) {
    this.privateKeyPath = join(options.directory, PRIVATE_KEY_FILE);
    this.publicKeyPath = join(options.directory, PUBLIC_KEY_FILE);
    this.modulusLength = options.modulusLength ?? DEFAULT_MODULUS_LENGTH;
  }

  /**
   * Guarantee a stored key pair exists, generating one if needed.
   *
   * Concurrent callers share the same in-flight check, so two first-time
   * callers end up with one generated pair.
   *
   * @throws {IdentityError} KEY_STORAGE_FAILED if the pair cannot be written
   */
  ensureKeys(): Promise<void> {
    if (!this.pending) {
      this.pending = this.generateIfMissing().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  /**
   * PKCS#8 PEM of the signing key
   */
  async loadPrivateKey(): Promise<string> {
    await this.ensureKeys();
    return this.readKeyFile(this.privateKeyPath);
  }

  /**
   * SPKI PEM of the verification key
   */
  async loadPublicKey(): Promise<string> {
    await this.ensureKeys();
    return this.readKeyFile(this.publicKeyPath);
  }

  /**
   * Public key as a JWK, with no private parameters.
   *
   * Derived from the stored public PEM alone.
   */
  async publicJWK(): Promise<PublicJWK> {
    const pem = await this.loadPublicKey();

    let n: string | undefined;
    let e: string | undefined;
    try {
      const key = await importSPKI(pem, SIGNING_ALGORITHM, { extractable: true });
      ({ n, e } = await exportJWK(key));
    } catch (error) {
      throw IdentityErrors.KEY_STORAGE_FAILED(
        `public key is unreadable (${error instanceof Error ? error.message : 'unknown error'})`
      );
    }

    if (!n || !e) {
      throw IdentityErrors.KEY_STORAGE_FAILED('public key is not an RSA key');
    }

    const kid = this.options.keyId ?? (await calculateJwkThumbprint({ kty: 'RSA', n, e }));

    return { kty: 'RSA', use: 'sig', kid, alg: SIGNING_ALGORITHM, n, e };
  }

  async jwks(): Promise<JWKSet> {
    return { keys: [await this.publicJWK()] };
  }

  async getKeyId(): Promise<string> {
    if (this.options.keyId) {
      return this.options.keyId;
    }
    return (await this.publicJWK()).kid;
  }

  private async generateIfMissing(): Promise<void> {
    const [hasPrivate, hasPublic] = await Promise.all([
      fileExists(this.privateKeyPath),
      fileExists(this.publicKeyPath),
    ]);
    if (hasPrivate && hasPublic) {
      return;
    }

    console.log(`[KeyManager] Generating RSA-${this.modulusLength} key pair...`);

    const { privateKey, publicKey } = await generateKeyPair(SIGNING_ALGORITHM, {
      modulusLength: this.modulusLength,
      extractable: true,
    });
    const [privatePem, publicPem] = await Promise.all([
      exportPKCS8(privateKey),
      exportSPKI(publicKey),
    ]);

    await this.persistPair(privatePem, publicPem);

    console.log(`[KeyManager] Keys saved to ${this.options.directory}`);
  }

  private async persistPair(privatePem: string, publicPem: string): Promise<void> {
    const suffix = `.${process.pid}.${Date.now()}.tmp`;
    const privateTmp = this.privateKeyPath + suffix;
    const publicTmp = this.publicKeyPath + suffix;

    try {
      await mkdir(this.options.directory, { recursive: true });
      await writeFile(privateTmp, privatePem, { encoding: 'utf-8', mode: 0o600 });
      await writeFile(publicTmp, publicPem, { encoding: 'utf-8', mode: 0o644 });
      // Private half last: a lone public key is regenerated over
      await rename(publicTmp, this.publicKeyPath);
      await rename(privateTmp, this.privateKeyPath);
    } catch (error) {
      await Promise.allSettled([rm(privateTmp, { force: true }), rm(publicTmp, { force: true })]);
      throw IdentityErrors.KEY_STORAGE_FAILED(
        `could not persist key pair (${error instanceof Error ? error.message : 'unknown error'})`
      );
    }
  }

  private async readKeyFile(path: string): Promise<string> {
    try {
      return await readFile(path, 'utf-8');
    } catch (error) {
      throw IdentityErrors.KEY_STORAGE_FAILED(
        `could not read ${path} (${error instanceof Error ? error.message : 'unknown error'})`
      );
    }
  }
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}
