import { EmailList } from '@/components/emails/email-list';

export default function EmailsPage() {
  return (
    <div className="space-y-6">
      <h1 className="text-3xl font-bold">Emails</h1>
      <EmailList />
    </div>
  );
}
