export { bytesToHex, bytesToUtf8, hexToBytes, isHexString, utf8ToBytes } from './encoding';
export { concatBytes, constantTimeEqual, zeroize } from './bytes';
