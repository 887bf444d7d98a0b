import type { Config } from 'tailwindcss'

const config: Config = {
  content: ['./app/**/*.{ts,tsx}', './lib/**/*.ts'],
  theme: {
    extend: {
      colors: {
        'brand-red': {
          DEFAULT: '#9b1c1c',
          dark: '#771d1d',
        },
      },
    },
  },
  plugins: [],
}

export default config
