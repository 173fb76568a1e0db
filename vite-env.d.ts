/// <reference types="vite/client" />

interface ImportMetaEnv {
    readonly VITE_DIFFICULTY_SCHEDULE?: string;
    readonly VITE_INPUT_POLL?: string;
    readonly VITE_DEBUG_MODE?: string;
}

interface ImportMeta {
    readonly env: ImportMetaEnv;
}
