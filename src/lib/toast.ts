import { toast } from "sonner";
import { describeError, isReportError } from "@/lib/errors";

export interface ToastOptions {
  duration?: number;
  description?: string;
  action?: {
    label: string;
    onClick: () => void;
  };
}

const baseStyle = {
  borderRadius: "0.75rem",
  padding: "1rem",
  boxShadow:
    "0 10px 15px -3px rgb(0 0 0 / 0.1), 0 4px 6px -4px rgb(0 0 0 / 0.1)",
};

export const showToast = {
  success: (message: string, options?: ToastOptions) => {
    return toast.success(message, {
      duration: options?.duration || 4000,
      description: options?.description,
      action: options?.action,
      style: {
        ...baseStyle,
        background: "rgb(240 253 250)",
        border: "1px solid rgb(34 197 94)",
        color: "rgb(22 101 52)",
      },
      className:
        "dark:!bg-green-950 dark:!border-green-800 dark:!text-green-100 [&>[data-description]]:!text-black dark:[&>[data-description]]:!text-green-200",
    });
  },

  error: (message: string, options?: ToastOptions) => {
    return toast.error(message, {
      duration: options?.duration || 6000,
      description: options?.description,
      action: options?.action,
      style: {
        ...baseStyle,
        background: "rgb(254 242 242)",
        border: "1px solid rgb(239 68 68)",
        color: "rgb(127 29 29)",
      },
      className:
        "dark:!bg-red-950 dark:!border-red-800 dark:!text-red-100 [&>[data-description]]:!text-red-700 dark:[&>[data-description]]:!text-red-200",
    });
  },

  warning: (message: string, options?: ToastOptions) => {
    return toast.warning(message, {
      duration: options?.duration || 5000,
      description: options?.description,
      action: options?.action,
      style: {
        ...baseStyle,
        background: "rgb(255 247 237)",
        border: "1px solid rgb(245 158 11)",
        color: "rgb(120 53 15)",
      },
      className:
        "dark:!bg-amber-950 dark:!border-amber-800 dark:!text-amber-100 [&>[data-description]]:!text-amber-700 dark:[&>[data-description]]:!text-amber-200",
    });
  },

  loading: (message: string) => {
    return toast.loading(message, {
      style: {
        ...baseStyle,
        background: "rgb(243 244 246)",
        border: "1px solid rgb(107 114 128)",
        color: "rgb(17 24 39)",
      },
      className:
        "dark:!bg-slate-950 dark:!border-slate-800 dark:!text-slate-100",
    });
  },
};

export const handleError = (error: unknown, context?: string) => {
  const title = describeError(error, "Something went wrong");
  let description = context ? `Failed to ${context}` : "";
  if (isReportError(error) && error.details) {
    description = error.details;
  }

  showToast.error(title, { description });
};

export const handleWarning = (message: string, description?: string) => {
  showToast.warning(message, { description });
};

export const handleSuccess = (message: string, context?: string) => {
  showToast.success(message, {
    description: context ? `Successfully ${context}` : undefined,
  });
};
