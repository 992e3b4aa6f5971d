import * as React from 'react';
import type { FieldErrors, LoginRequest } from '@chessboard/shared';
import { Layout } from './layout.js';
import { ErrorMessage, TextField } from './form-fields.js';

interface LoginPageProps {
  username?: string;
  error?: string | null;
  fieldErrors?: FieldErrors<LoginRequest>;
}

export const LoginPage: React.FC<LoginPageProps> = ({ username, error, fieldErrors = {} }) => {
  return (
    <Layout title="Log in">
      <h1>Log in</h1>
      <ErrorMessage message={error} />
      <form method="post" action="/login/">
        <TextField
          name="username"
          label="Username"
          value={username}
          errors={fieldErrors.username}
          autoComplete="username"
        />
        <TextField
          name="password"
          label="Password"
          type="password"
          errors={fieldErrors.password}
          autoComplete="current-password"
        />
        <button type="submit">Log in</button>
      </form>
      <p>
        No account yet? <a href="/join/">Join</a>
      </p>
    </Layout>
  );
};
