import defaults from "@/config/default-inputs.json";
import type { ReportInputs } from "@/types/report";

export type AppConfig = {
  appTitle: string;
  currencyPrefix: string;
};

type ConfigEnv = Pick<ImportMetaEnv, "VITE_APP_TITLE" | "VITE_CURRENCY_PREFIX">;

export function loadConfig(env: ConfigEnv = import.meta.env): AppConfig {
  return {
    appTitle: env.VITE_APP_TITLE?.trim() || "Weekly Sales Report",
    currencyPrefix: env.VITE_CURRENCY_PREFIX?.trim() || "KSH",
  };
}

export const config = loadConfig();

export const defaultInputs: Omit<ReportInputs, "reportDate"> = defaults;
