/**
 * Identifiers shared by every part of the stack
 */

/** Label carried by every container the stack owns; its value is the service name */
export const COMPONENT_LABEL = 'modelstack.component';

/** Label the compose tool puts on volumes and networks of a project */
export const COMPOSE_PROJECT_LABEL = 'com.docker.compose.project';

export const DEFAULT_PROJECT_NAME = 'modelstack';

/** Version of the stack definition shipped with this CLI */
export const STACK_VERSION = '0.6.0';

export const CONFIG_FILE_NAME = '.modelstack.json';
export const ENV_FILE_NAME = '.env';
export const HOME_ENV_VAR = 'MODELSTACK_HOME';
