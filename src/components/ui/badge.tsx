import type { HTMLAttributes } from "react"
import { cva, type VariantProps } from "class-variance-authority"

import { cn } from "@/lib/utils"

const badgeVariants = cva(
  "inline-flex items-center rounded-md border px-2 py-0.5 text-[10px] font-semibold uppercase tracking-wide whitespace-nowrap",
  {
    variants: {
      variant: {
        default: "border-transparent !bg-teal-600 dark:!bg-teal-500 !text-white",
        success:
          "border-transparent !bg-green-100 dark:!bg-green-900/30 !text-green-800 dark:!text-green-200",
        warning:
          "border-transparent !bg-amber-100 dark:!bg-amber-900/30 !text-amber-800 dark:!text-amber-200",
        destructive:
          "border-transparent !bg-red-100 dark:!bg-red-900/30 !text-red-700 dark:!text-red-200",
      },
    },
    defaultVariants: {
      variant: "default",
    },
  }
)

export interface BadgeProps
  extends HTMLAttributes<HTMLSpanElement>,
    VariantProps<typeof badgeVariants> {}

function Badge({ className, variant, ...props }: BadgeProps) {
  return <span className={cn(badgeVariants({ variant }), className)} {...props} />
}

export { Badge }
