import * as React from "react"

import { cn } from "@/lib/utils"
import { fieldClassName } from "./input"

const Textarea = React.forwardRef<HTMLTextAreaElement, React.TextareaHTMLAttributes<HTMLTextAreaElement>>(
  ({ className, ...props }, ref) => <textarea className={cn(fieldClassName, "min-h-24", className)} ref={ref} {...props} />,
)
Textarea.displayName = "Textarea"

export { Textarea }
