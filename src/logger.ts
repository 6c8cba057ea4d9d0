import * as core from '@actions/core';
import * as types from './types';

/** Routes diagnostics to the GitHub Actions log. */
export const coreLogger: types.Logger = {
    info: (message) => core.info(message),
    warning: (message) => core.warning(message),
    debug: (message) => core.debug(message),
    error: (message) => core.error(message)
};
