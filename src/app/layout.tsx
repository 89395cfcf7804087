import type { Metadata } from "next"

export const metadata: Metadata = {
  title: "Judging Scheduler",
  description: "Judging slot assignment and no-show recovery",
}

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode
}>) {
  return (
    <html lang="en">
      <body>
        <main style={{ padding: "1.5rem", fontFamily: "system-ui, sans-serif" }}>{children}</main>
      </body>
    </html>
  )
}
