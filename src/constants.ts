export const SERVER_NAME = 'ocean-mcp' as const;
export const SERVER_VERSION = '0.1.0' as const;

export const OCEAN_INFO = 'ocean_info' as const;
export const OCEAN_LIST_POLARIZATIONS = 'ocean_list_polarizations' as const;
export const OCEAN_PARSE_RUN = 'ocean_parse_run' as const;
export const OCEAN_GET_CHILD_RUN = 'ocean_get_child_run' as const;

