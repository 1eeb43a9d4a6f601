export { Button, buttonVariants } from "./button"
export { Textarea } from "./textarea"
export { Input } from "./input"
export { Label } from "./label"
export { Select } from "./select"
export { Card, CardContent, CardDescription, CardHeader, CardTitle } from "./card"
export { default as ThemeToggle } from "./ThemeToggle"
