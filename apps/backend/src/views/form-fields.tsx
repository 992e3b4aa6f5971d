import * as React from 'react';

interface TextFieldProps {
  name: string;
  label: string;
  type?: 'text' | 'email' | 'password';
  value?: string;
  errors?: string[];
  autoComplete?: string;
  placeholder?: string;
}

export const TextField: React.FC<TextFieldProps> = ({
  name,
  label,
  type = 'text',
  value,
  errors,
  autoComplete,
  placeholder,
}) => {
  return (
    <p style={field}>
      <label htmlFor={`id_${name}`} style={labelStyle}>
        {label}
      </label>
      <input
        id={`id_${name}`}
        name={name}
        type={type}
        defaultValue={type === 'password' ? undefined : value}
        autoComplete={autoComplete}
        placeholder={placeholder}
        style={input}
      />
      {errors?.map((message) => (
        <span key={message} className="field-error" style={fieldError}>
          {message}
        </span>
      ))}
    </p>
  );
};

export const ErrorMessage: React.FC<{ message?: string | null }> = ({ message }) => {
  if (!message) return null;
  return (
    <p className="error" role="alert" style={errorBox}>
      {message}
    </p>
  );
};

const field: React.CSSProperties = {
  display: 'flex',
  flexDirection: 'column',
  gap: '4px',
  margin: '0 0 12px',
};

const labelStyle: React.CSSProperties = {
  fontWeight: 600,
};

const input: React.CSSProperties = {
  padding: '6px 8px',
  fontSize: '16px',
  maxWidth: '320px',
};

const fieldError: React.CSSProperties = {
  color: '#b00020',
  fontSize: '14px',
};

export const errorBox: React.CSSProperties = {
  padding: '8px 12px',
  border: '1px solid #e0a0a0',
  backgroundColor: '#fdecec',
  color: '#8a1c1c',
  borderRadius: '4px',
};
