/**
 * Authentication — password hashing and the flat-file credential store.
 */

export { hashPassword, CredentialStore } from './credentials.js'
