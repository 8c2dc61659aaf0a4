/**
 * Service exports
 */
export * from "./TerminalTransport"
export * from "./CapabilityProber"
export * from "./KeyboardProtocol"
