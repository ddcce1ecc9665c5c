import type { Config } from 'tailwindcss';

const themeColor = (name: string) => `hsl(var(--${name}) / <alpha-value>)`;

export default {
  darkMode: 'class',
  content: ['./index.html', './src/**/*.{ts,tsx}'],
  theme: {
    extend: {
      colors: {
        background: themeColor('background'),
        foreground: themeColor('foreground'),
        card: {
          DEFAULT: themeColor('card'),
          foreground: themeColor('card-foreground'),
        },
        muted: {
          DEFAULT: themeColor('muted'),
          foreground: themeColor('muted-foreground'),
        },
        primary: {
          DEFAULT: themeColor('primary'),
          foreground: themeColor('primary-foreground'),
        },
        secondary: {
          DEFAULT: themeColor('secondary'),
          foreground: themeColor('secondary-foreground'),
        },
        destructive: themeColor('destructive'),
        success: themeColor('success'),
        border: themeColor('border'),
        input: themeColor('input'),
        ring: themeColor('ring'),
        // quick-insert accents: values valid for hours, and the rest
        hour: themeColor('hour'),
        minute: themeColor('minute'),
      },
      borderRadius: {
        lg: 'var(--radius)',
        md: 'calc(var(--radius) - 2px)',
        sm: 'calc(var(--radius) - 4px)',
      },
    },
  },
  plugins: [],
} satisfies Config;
