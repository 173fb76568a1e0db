import React from 'react';

type ButtonTone = 'red' | 'blue';

interface ButtonProps extends React.ButtonHTMLAttributes<HTMLButtonElement> {
  tone?: ButtonTone;
  fullWidth?: boolean;
}

// Matches the car colours on the canvas
const TONES: Record<ButtonTone, string> = {
  red: 'bg-lane-red text-white hover:bg-red-600',
  blue: 'bg-lane-blue text-lane-navy hover:bg-sky-300'
};

export const Button: React.FC<ButtonProps> = ({
  children,
  tone = 'blue',
  fullWidth = false,
  type = 'button',
  className = '',
  ...props
}) => (
  <button
    type={type}
    className={`font-pixel uppercase text-sm py-3 px-6 rounded-sm active:scale-95 transition-transform ${TONES[tone]} ${fullWidth ? 'w-full' : ''} ${className}`}
    {...props}
  >
    {children}
  </button>
);
