/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_CURRENCY_PREFIX?: string
  readonly VITE_APP_TITLE?: string
}

interface ImportMeta {
  readonly env: ImportMetaEnv
}
