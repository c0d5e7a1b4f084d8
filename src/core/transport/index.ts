/**
 * Transport Module
 *
 * Runs commands on managed hosts over SSH.
 */

export * from "./interfaces/ITransport.js";
export * from "./impl/SshTransport.js";
