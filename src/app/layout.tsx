import type { Metadata } from "next";
import type { ReactNode } from "react";
import "./globals.css";
import Link from "next/link";

export const metadata: Metadata = {
  title: "Recipe Finder",
  description: "Find recipes you can cook with the ingredients you already have",
};

export default function RootLayout({
  children,
}: Readonly<{
  children: ReactNode;
}>) {
  return (
    <html lang="en">
      <body>
        <div className="min-h-[100dvh] bg-slate-50 text-slate-900 dark:bg-slate-950 dark:text-slate-100">
          <header className="sticky top-0 z-40 border-b border-emerald-900/10 bg-white/90 backdrop-blur-xl supports-[backdrop-filter]:bg-white/75 dark:border-emerald-200/10 dark:bg-slate-950/80 dark:supports-[backdrop-filter]:bg-slate-950/55">
            <div className="mx-auto flex h-16 w-full max-w-[1400px] items-center px-4 md:px-8">
              <Link href="/" className="mr-8 flex items-center gap-2">
                <span className="inline-flex h-8 w-8 items-center justify-center rounded-lg border border-emerald-200 bg-emerald-50 text-sm font-semibold text-emerald-700 dark:border-emerald-400/30 dark:bg-emerald-500/10 dark:text-emerald-300">
                  RF
                </span>
                <span className="text-lg font-semibold tracking-tight text-slate-900 dark:text-slate-100">Recipe Finder</span>
              </Link>
              <p className="ml-auto hidden text-sm text-slate-500 md:block dark:text-slate-400">
                Search for recipes by ingredients
              </p>
            </div>
          </header>

          <main className="mx-auto w-full max-w-[1400px] px-4 py-6 md:px-8 md:py-10">{children}</main>
        </div>
      </body>
    </html>
  );
}
