/** Top-level namespace of the client library */
export const LIBRARY_NAMESPACE = 'hmcclient';

/** Logger for user-issued API calls */
export const API_LOGGER_NAME = `${LIBRARY_NAMESPACE}.api`;

/** Logger for the interactions between the client and the HMC */
export const HMC_LOGGER_NAME = `${LIBRARY_NAMESPACE}.hmc`;

export const ARGS_REPR_LIMIT = 500;
export const RESULT_REPR_LIMIT = 1000;

export const TRUNCATION_MARKER = '...[truncated]';
