import * as React from "react"

import { cn } from "@/lib/utils"
import { fieldClassName } from "./input"

const Select = React.forwardRef<HTMLSelectElement, React.SelectHTMLAttributes<HTMLSelectElement>>(
  ({ className, ...props }, ref) => <select className={cn(fieldClassName, "h-10", className)} ref={ref} {...props} />,
)
Select.displayName = "Select"

export { Select }
