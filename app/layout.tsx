import type { Metadata } from "next";
import "./globals.css";

export const metadata: Metadata = {
  title: "Weekuren",
  description: "Weekly attendance uploads merged into a cumulative hours overview per student"
};

export default function RootLayout({ children }: { children: React.ReactNode }) {
  return (
    <html lang="nl">
      <body>{children}</body>
    </html>
  );
}
