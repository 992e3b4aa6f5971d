import * as React from 'react';
import { Layout } from './layout.js';

interface ErrorPageProps {
  statusCode: number;
  message: string;
  stack?: string;
}

export const ErrorPage: React.FC<ErrorPageProps> = ({ statusCode, message, stack }) => {
  return (
    <Layout title={`Error ${statusCode}`}>
      <h1>{`Error ${statusCode}`}</h1>
      <p className="error-message">{message}</p>
      {stack ? <pre>{stack}</pre> : null}
      <p>
        <a href="/">Back to the board</a>
      </p>
    </Layout>
  );
};
