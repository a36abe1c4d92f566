// src/app/layout.tsx
import type { Metadata } from "next";
import "./globals.css";

export const metadata: Metadata = {
  title: "Graph Builder",
  description: "Upload a CSV file and turn it into a line, bar or scatter graph.",
};

export default function RootLayout({ children }: { children: React.ReactNode }) {
  return (
    <html lang="en">
      <body>
        <div className="page">
          <header className="topbar">
            <h1>Graph Builder</h1>
          </header>
          <main>{children}</main>
        </div>
      </body>
    </html>
  );
}
