/**
 * Credentials
 *
 * Static username/password table used by the login state machine.
 */

export { CredentialStore, parseCredentials, loadCredentials } from './store.js';
