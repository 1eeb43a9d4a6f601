import type { Metadata, Viewport } from "next";
import "./globals.css";

const appTitle = "SkillSync — Skill-Gap Analyzer & Career Guidance"
const appDescription =
  "Compare your skills with a target role, see what is missing, and get a salary range and career guidance."

export const metadata: Metadata = {
  title: {
    default: appTitle,
    template: "%s • SkillSync",
  },
  description: appDescription,
  keywords: ["skill gap", "career guidance", "salary calculator", "skills assessment", "skillsync"],
  openGraph: {
    title: appTitle,
    description: appDescription,
    siteName: "SkillSync",
    type: "website",
    locale: "en_US",
  },
  twitter: {
    card: "summary",
    title: appTitle,
    description: appDescription,
  },
};

export const viewport: Viewport = {
  themeColor: [
    { media: "(prefers-color-scheme: dark)", color: "#0F172A" },
    { media: "(prefers-color-scheme: light)", color: "#F8FAFC" },
  ],
};

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode;
}>) {
  return (
    <html lang="en" suppressHydrationWarning>
      <body className="antialiased">{children}</body>
    </html>
  );
}
