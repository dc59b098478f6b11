export * from "./services/tidal";
export { clearSession, loadSession, saveSession } from "./services/sessionStore";
