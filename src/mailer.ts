import nodemailer from "nodemailer";
import type SMTPTransport from "nodemailer/lib/smtp-transport/index.js";

export type EmailMessage = {
  to: string;
  cc?: string;
  subject: string;
  text: string;
};

export type EmailTransport = {
  send: (message: EmailMessage) => Promise<void>;
  verify: () => Promise<void>;
};

export type SmtpConfig = {
  host: string;
  port: number;
  secure: boolean;
  address: string;
  password: string;
  senderName?: string;
  /** Bounds connecting, the greeting and every socket read of one send. */
  timeoutMs: number;
};

export function buildSmtpOptions(config: SmtpConfig): SMTPTransport.Options {
  return {
    host: config.host,
    port: config.port,
    secure: config.secure,
    requireTLS: !config.secure,
    auth: {
      user: config.address,
      pass: config.password
    },
    connectionTimeout: config.timeoutMs,
    greetingTimeout: config.timeoutMs,
    socketTimeout: config.timeoutMs
  };
}

export function createSmtpTransport(config: SmtpConfig): EmailTransport {
  const transporter = nodemailer.createTransport(buildSmtpOptions(config));
  const from = config.senderName
    ? { name: config.senderName, address: config.address }
    : config.address;

  return {
    async send(message) {
      await transporter.sendMail({
        from,
        to: message.to,
        cc: message.cc,
        subject: message.subject,
        text: message.text
      });
    },
    async verify() {
      await transporter.verify();
    }
  };
}
