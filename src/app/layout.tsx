import type { Metadata } from 'next'
import { CONFIG } from '@/lib/config'
import { Providers } from './providers'
import './globals.css'

export const metadata: Metadata = {
  title: CONFIG.app.name,
  description: CONFIG.app.description,
}

export default function RootLayout({ children }: { children: React.ReactNode }) {
  return (
    <html lang="en">
      <body>
        <Providers>{children}</Providers>
      </body>
    </html>
  )
}
