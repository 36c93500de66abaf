import { TokenEncryption, ENCRYPTION_KEY_ENV } from '../src/utils/encryption.util';

// Prints a fresh key for FRAMEIO_AUTH_ENCRYPTION_KEY
const key = TokenEncryption.generateKey();
console.log('🔑 New encryption key:');
console.log('');
console.log(`${ENCRYPTION_KEY_ENV}=${key}`);
console.log('');
console.log('Store it in your environment. Rotating it invalidates all stored tokens and secrets.');
