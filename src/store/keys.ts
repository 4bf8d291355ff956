/**
 * Setting names in the persisted config file
 */

export const CONFIG_DEVELOPER_MODE = "DEVELOPER_MODE";

export const CONFIG_OPZ_MOUNT_PATH = "OPZ_MOUNT_PATH";
export const CONFIG_OP1_MOUNT_PATH = "OP1_MOUNT_PATH";
export const CONFIG_OPZ_DETECTED_PATH = "OPZ_DETECTED_PATH";
export const CONFIG_OP1_DETECTED_PATH = "OP1_DETECTED_PATH";
