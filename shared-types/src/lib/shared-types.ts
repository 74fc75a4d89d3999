/**
 * `'1'` asks about booking or room details, `'2'` asks for general hotel information.
 */
export type QueryCategory = '1' | '2';

export interface QueryRequest {
  query: string;
}

export interface QueryResponse {
  response: string;
}

export interface ErrorResponse {
  error: string;
}

export interface SendEmailRequest {
  email: string;
  subject?: string;
  body?: string;
}

export type SendEmailResult =
  | {
      success: true;
      message: string;
    }
  | {
      success: false;
      error: string;
    };

export interface RoomRecord {
  id: number;
  title: string;
  description: string;
}
