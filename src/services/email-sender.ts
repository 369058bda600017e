import * as nodemailer from 'nodemailer';
import type { AlertMessage, ReportDate, SmtpSettings } from '../types';
import { formatReportFileName } from './cutoff';
import type { Logger } from './logger';

export const MISSING_REPORT_SUBJECT = 'Last Possible Report Missing';

export interface AlertSender {
    sendEmail(message: AlertMessage): Promise<void>;
}

export function buildMissingReportAlert(directory: string, expectedDate: ReportDate): AlertMessage {
    return {
        subject: MISSING_REPORT_SUBJECT,
        body:
            `The last possible report in directory: ${directory}` +
            ' is missing and automated reprocessing will be triggered' +
            ' to attempt recovery' +
            `\n\nExpected file: ${formatReportFileName(expectedDate)}`,
        attachments: [],
    };
}

export class EmailSender implements AlertSender {
    constructor(
        private readonly smtp: SmtpSettings,
        private readonly sender: string,
        private readonly recipients: string[],
        private readonly logger: Logger
    ) {}

    private createTransporter() {
        return nodemailer.createTransport({
            host: this.smtp.host,
            port: this.smtp.port,
            secure: this.smtp.secure,
            auth: {
                user: this.smtp.username,
                pass: this.smtp.password,
            },
        });
    }

    /**
     * Send a message to every configured recipient. Delivery errors are thrown.
     */
    async sendEmail(message: AlertMessage): Promise<void> {
        const attachments = message.attachments ?? [];
        const to = this.recipients.join(', ');

        const mailOptions: nodemailer.SendMailOptions = {
            from: this.sender,
            to,
            subject: message.subject,
            text: message.body,
            html: this.convertToHtml(message.body),
            attachments: attachments.map(attachment => ({
                filename: attachment.filename,
                content: attachment.content,
            })),
        };

        await this.createTransporter().sendMail(mailOptions);
        this.logger.info(`Alert "${message.subject}" sent to ${to} via ${this.smtp.host}`);
    }

    /**
     * Test SMTP connection
     */
    async testConnection(): Promise<boolean> {
        try {
            await this.createTransporter().verify();
            return true;
        } catch (error) {
            this.logger.error(`SMTP verification failed for ${this.smtp.host}:${this.smtp.port}`, error);
            return false;
        }
    }

    private convertToHtml(text: string): string {
        const escaped = text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
        return escaped
            .split(/\n{2,}/)
            .map(paragraph => `<p>${paragraph.replace(/\n/g, '<br>')}</p>`)
            .join('');
    }
}
