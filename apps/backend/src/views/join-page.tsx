import * as React from 'react';
import type { FieldErrors, JoinRequest } from '@chessboard/shared';
import { Layout } from './layout.js';
import { ErrorMessage, TextField } from './form-fields.js';

export type JoinFormValues = Partial<Record<Exclude<keyof JoinRequest, 'password'>, string>>;

interface JoinPageProps {
  values?: JoinFormValues;
  error?: string | null;
  fieldErrors?: FieldErrors<JoinRequest>;
}

export const JoinPage: React.FC<JoinPageProps> = ({ values = {}, error, fieldErrors = {} }) => {
  return (
    <Layout title="Join">
      <h1>Join</h1>
      <ErrorMessage message={error} />
      <form method="post" action="/join/">
        <TextField name="firstName" label="First name" value={values.firstName} errors={fieldErrors.firstName} />
        <TextField name="lastName" label="Last name" value={values.lastName} errors={fieldErrors.lastName} />
        <TextField
          name="username"
          label="Username"
          value={values.username}
          errors={fieldErrors.username}
          autoComplete="username"
        />
        <TextField name="email" label="Email" type="email" value={values.email} errors={fieldErrors.email} />
        <TextField
          name="password"
          label="Password"
          type="password"
          errors={fieldErrors.password}
          autoComplete="new-password"
        />
        <button type="submit">Join</button>
      </form>
      <p>
        Already registered? <a href="/login/">Log in</a>
      </p>
    </Layout>
  );
};
