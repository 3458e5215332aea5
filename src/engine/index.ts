/**
 * Engine boundary exports
 */

export { BindingEngine, errorTrampoline, pollTrampoline } from "./binding";
export { engineFromModule, isBackupEngine, isEngineBinding, loadEngine } from "./loader";
export { POLL_CANCEL, POLL_CONTINUE, PREPARING_BACKUP_PREFIX } from "./protocol";
