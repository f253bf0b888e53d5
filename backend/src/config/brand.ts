export const BRAND_NAME = "PromptMix";
export const BRAND_SLUG = "promptmix";
export const BRAND_API_TITLE = `${BRAND_NAME} API`;
export const BRAND_API_DOCS_TITLE = `${BRAND_NAME} API Documentation`;
export const BRAND_API_DESCRIPTION =
    "Generate, remix and publish playlists from a free-text prompt";
