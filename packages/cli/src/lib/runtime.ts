/**
 * True when running on Node.js, which provides the filesystem, the keychain
 * bindings and loopback sockets the auth flow needs.
 */
export function isNodeRuntime(): boolean {
  return (
    typeof process !== "undefined" &&
    process.versions != null &&
    typeof process.versions.node === "string"
  );
}
