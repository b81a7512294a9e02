export { BlsHDWallet, blsKeyDeriver, blsPublicKey, blsSign, blsVerify } from './hdwallet';
export {
  KeystoreEncryptor,
  KEYSTORE_DECRYPTION_FAILED,
  normalizePassphrase,
  type KeystoreCrypto,
  type KeystoreEncryptorOptions,
  type KeystoreKdf,
} from './keystore';
export { BundleCipher, BUNDLE_DECRYPTION_FAILED, type BundleCipherOptions } from './bundle';
export type { EncryptedPayload, Encryptor, KeyDeriver, KeyPair } from './types';
